import { createTracer } from './tracer';

describe('Tracer', () => {
  it('hands out non-recording spans without a collector endpoint', () => {
    const tracer = createTracer({ serviceName: 'ledger-test' });
    tracer.start();

    expect(tracer.withSpan('reconciliation.test', (span) => span.isRecording())).toBe(false);
  });

  it('returns the value produced inside a span', () => {
    const tracer = createTracer({ serviceName: 'ledger-test' });

    const result = tracer.withSpan('reconciliation.test', () => 42, { rows: 3 });

    expect(result).toBe(42);
  });

  it('rethrows errors raised inside a span', () => {
    const tracer = createTracer({ serviceName: 'ledger-test' });

    expect(() =>
      tracer.withSpan('reconciliation.test', () => {
        throw new Error('stage failed');
      })
    ).toThrow('stage failed');
  });

  it('stops cleanly when never started', async () => {
    const tracer = createTracer({ serviceName: 'ledger-test' });

    await expect(tracer.stop()).resolves.toBeUndefined();
  });
});
