export class ReconciliationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingKeyComponentError extends ReconciliationError {
  constructor(
    readonly entity: string,
    readonly component: string
  ) {
    super(`Missing key component '${component}' for ${entity}`);
  }
}

export class ConfigurationError extends ReconciliationError {
  constructor(readonly issues: string[]) {
    super(`Invalid reconciliation configuration: ${issues.join('; ')}`);
  }
}
