import { buildCoverageSource, testConfig, utc } from '../../test/fixtures';
import { CoverageResolver } from './coverage-resolver';

describe('CoverageResolver', () => {
  const resolver = new CoverageResolver(testConfig);
  const noReferences = { carriers: null, subscribers: null };

  it('resolves a verified, non-pending plan as active with an open interval', () => {
    const { output, violations } = resolver.buildCoverage([buildCoverageSource()], noReferences);

    expect(violations).toEqual([]);
    expect(output.resolve(10, 500)).toEqual({
      insurancePlanId: 500,
      patientId: 10,
      carrierId: 70,
      carrierName: 'Placeholder Dental Mutual',
      subscriberId: 80,
      planType: 'PPO',
      groupNumber: 'GRP-1',
      groupName: 'Test Group',
      verificationDate: utc('2024-01-05T00:00:00'),
      benefitDetails: null,
      isActive: true,
      effectiveDate: utc('2023-06-01T00:00:00'),
      terminationDate: null,
      isIncompleteRecord: false,
      ordinal: 1,
    });
    expect(output.hasActiveCoverage(10)).toBe(true);
    expect(output.hasActiveCoverage(11)).toBe(false);
    expect(output.resolve(11, 500)).toBeNull();
    expect(output.resolve(10, null)).toBeNull();
    expect(output.resolve(null, 500)).toBeNull();
  });

  it('marks a coverage missing its carrier incomplete with sentinel ids, never null', () => {
    const { output } = resolver.buildCoverage([buildCoverageSource({ carrierId: null })], noReferences);
    const coverage = output.resolve(10, 500);

    expect(coverage?.isIncompleteRecord).toBe(true);
    expect(coverage?.carrierId).toBe(-1);
    expect(coverage?.subscriberId).toBe(-1);
    expect(coverage?.carrierName).toBeNull();
  });

  it('resolves references against the carrier and subscriber feeds when supplied', () => {
    const { output } = resolver.buildCoverage(
      [buildCoverageSource(), buildCoverageSource({ planId: 501, subscriberId: 81 })],
      {
        carriers: [{ carrierId: 70, carrierName: 'Feed Carrier' }],
        subscribers: [{ subscriberId: 80 }],
      }
    );

    expect(output.resolve(10, 500)).toMatchObject({ carrierName: 'Feed Carrier', subscriberId: 80, isIncompleteRecord: false });
    expect(output.resolve(10, 501)).toMatchObject({ carrierId: 70, subscriberId: -1, isIncompleteRecord: true });
  });

  it('treats pending or unverified coverage as inactive and terminates pending plans', () => {
    const { output } = resolver.buildCoverage(
      [
        buildCoverageSource({ planId: 600, isPending: true, updatedAt: utc('2024-02-01T00:00:00') }),
        buildCoverageSource({ planId: 601, verificationDate: null }),
      ],
      noReferences
    );

    expect(output.resolve(10, 600)).toMatchObject({ isActive: false, terminationDate: utc('2024-02-01T00:00:00') });
    expect(output.resolve(10, 601)).toMatchObject({ isActive: false, terminationDate: null });
    expect(output.hasActiveCoverage(10)).toBe(false);
  });

  it('dates coverage from the earliest contributing record, else the epoch floor', () => {
    const { output } = resolver.buildCoverage(
      [
        buildCoverageSource({ planId: 700, createdAt: utc('2023-09-01T00:00:00'), updatedAt: utc('2024-01-01T00:00:00') }),
        buildCoverageSource({
          planId: 700,
          createdAt: null,
          updatedAt: utc('2022-12-01T00:00:00'),
          verificationDate: utc('2024-03-01T00:00:00'),
          groupName: 'Older Name',
        }),
        buildCoverageSource({ planId: 701, createdAt: null, updatedAt: null }),
      ],
      noReferences
    );

    expect(output.resolve(10, 700)).toMatchObject({
      effectiveDate: utc('2022-12-01T00:00:00'),
      verificationDate: utc('2024-03-01T00:00:00'),
      groupName: 'Test Group',
    });
    expect(output.resolve(10, 701)?.effectiveDate).toEqual(utc('2020-01-01T00:00:00'));
  });

  it('warns when one plan id arrives for several patients', () => {
    const { output, violations } = resolver.buildCoverage(
      [buildCoverageSource(), buildCoverageSource({ patientId: 12, updatedAt: utc('2024-02-01T00:00:00') })],
      noReferences
    );

    expect(output.resolve(12, 500)?.patientId).toBe(12);
    expect(output.resolve(10, 500)).toBeNull();
    expect(violations).toEqual([
      {
        ruleId: 'coverage_plan_patient_conflict',
        category: 'DataQualityWarning',
        severity: 'warn',
        entityKey: 'insurance_plan_id=500',
        message: "Plan delivered for 2 patients (10, 12); the latest record's patient is kept",
      },
    ]);
  });
});
