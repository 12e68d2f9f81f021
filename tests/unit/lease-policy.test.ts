import { describe, expect, it } from 'vitest';

import {
  SECONDS_PER_YEAR,
  assertValidDuration,
  claimPrice,
  expiresAt,
  isLapsed,
  leaseStatus,
  renewalPrice
} from '../../src/application/registry/LeasePolicy.js';
import { ERROR_CODE } from '../../src/shared/errors/ErrorCode.js';
import { errorCodeOf } from '../helpers/registry.js';

const config = { adminIdentity: 'admin', pricePerYear: 100n, renewalMultiplier: 3n, paused: false };

describe('lease policy', () => {
  it('uses a fixed 365-day year', () => {
    expect(SECONDS_PER_YEAR).toBe(31_536_000);
  });

  it('computes expiry from the registration anchor and cumulative duration', () => {
    const record = { owner: 'alice', registeredAt: 1_000, durationYears: 3, paidAmount: 0n };

    expect(expiresAt(record)).toBe(1_000 + 3 * 31_536_000);
    expect(isLapsed(record, expiresAt(record))).toBe(false);
    expect(isLapsed(record, expiresAt(record) + 1)).toBe(true);
  });

  it('maps records to unclaimed, active and lapsed', () => {
    const record = { owner: 'alice', registeredAt: 0, durationYears: 1, paidAmount: 0n };

    expect(leaseStatus(undefined, 5)).toBe('unclaimed');
    expect(leaseStatus(record, SECONDS_PER_YEAR)).toBe('active');
    expect(leaseStatus(record, SECONDS_PER_YEAR + 1)).toBe('lapsed');
  });

  it('prices claims and renewals', () => {
    expect(claimPrice(config, 4)).toBe(400n);
    expect(renewalPrice(config, 4)).toBe(1_200n);
  });

  it('accepts whole years from 1 to 10 only', () => {
    expect(errorCodeOf(() => assertValidDuration(1))).toBeUndefined();
    expect(errorCodeOf(() => assertValidDuration(10))).toBeUndefined();
    expect(errorCodeOf(() => assertValidDuration(0))).toBe(ERROR_CODE.INVALID_DURATION);
    expect(errorCodeOf(() => assertValidDuration(11))).toBe(ERROR_CODE.INVALID_DURATION);
    expect(errorCodeOf(() => assertValidDuration(2.5))).toBe(ERROR_CODE.INVALID_DURATION);
    expect(errorCodeOf(() => assertValidDuration(Number.NaN))).toBe(ERROR_CODE.INVALID_DURATION);
  });
});
