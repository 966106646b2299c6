/** Placeholder the source uses for "amount not yet determined". */
export const SENTINEL_AMOUNT = -1;

const SENTINEL_CENTS = -100;

export const toCents = (amount: number): number => Math.round(amount * 100);

export const fromCents = (cents: number): number => cents / 100;

export const roundAmount = (amount: number): number => fromCents(toCents(amount));

export const isSentinelAmount = (amount: number | null): boolean =>
  amount !== null && toCents(amount) === SENTINEL_CENTS;

export const subtractAmounts = (minuend: number, subtrahend: number): number =>
  fromCents(toCents(minuend) - toCents(subtrahend));

export const sumAmounts = (amounts: readonly number[]): number =>
  fromCents(amounts.reduce((total, amount) => total + toCents(amount), 0));

export const compareAmounts = (left: number, right: number): number => toCents(left) - toCents(right);

export const formatAmount = (amount: number): string => {
  const cents = toCents(amount);
  const sign = cents < 0 ? '-' : '';
  const absolute = Math.abs(cents);
  return `${sign}${Math.floor(absolute / 100)}.${String(absolute % 100).padStart(2, '0')}`;
};
