import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import type { Amount, LeaseRecord, LeaseStatus, RegistryConfig, Timestamp } from './types.js';

// Fixed 365-day year; leap years are not accounted for.
export const SECONDS_PER_YEAR = 365 * 24 * 60 * 60;

export const MIN_LEASE_YEARS = 1;
export const MAX_LEASE_YEARS = 10;

export const expiresAt = (record: LeaseRecord): Timestamp =>
  record.registeredAt + record.durationYears * SECONDS_PER_YEAR;

/** A lease has lapsed once `now` is strictly past its expiry. */
export const isLapsed = (record: LeaseRecord, now: Timestamp): boolean => now > expiresAt(record);

export const leaseStatus = (record: LeaseRecord | undefined, now: Timestamp): LeaseStatus => {
  if (!record) {
    return 'unclaimed';
  }
  return isLapsed(record, now) ? 'lapsed' : 'active';
};

export const assertValidDuration = (years: number): void => {
  if (!Number.isInteger(years) || years < MIN_LEASE_YEARS || years > MAX_LEASE_YEARS) {
    throw new AppError(`Lease duration must be between ${MIN_LEASE_YEARS} and ${MAX_LEASE_YEARS} years.`, {
      code: ERROR_CODE.INVALID_DURATION,
      details: { years, min: MIN_LEASE_YEARS, max: MAX_LEASE_YEARS },
      suggestions: [`Pass a whole number of years from ${MIN_LEASE_YEARS} to ${MAX_LEASE_YEARS}.`]
    });
  }
};

export const claimPrice = (config: RegistryConfig, years: number): Amount => config.pricePerYear * BigInt(years);

export const renewalPrice = (config: RegistryConfig, years: number): Amount =>
  config.pricePerYear * BigInt(years) * config.renewalMultiplier;

export const assertSufficientPayment = (payment: Amount, required: Amount): void => {
  if (payment < required) {
    throw new AppError('Attached payment is below the required amount.', {
      code: ERROR_CODE.INSUFFICIENT_PAYMENT,
      details: { payment: payment.toString(), required: required.toString() },
      suggestions: [`Attach at least ${required.toString()}.`]
    });
  }
};

export const assertClaimable = (name: string, record: LeaseRecord | undefined, now: Timestamp): void => {
  if (record && !isLapsed(record, now)) {
    throw new AppError(`Domain "${name}" is still under an active lease.`, {
      code: ERROR_CODE.DOMAIN_STILL_ACTIVE,
      details: { name, owner: record.owner, expiresAt: expiresAt(record) },
      suggestions: ['Wait until the current lease lapses before claiming.']
    });
  }
};

export const assertLeaseOwner = (
  name: string,
  record: LeaseRecord | undefined,
  caller: string
): LeaseRecord => {
  if (!record || record.owner !== caller) {
    throw new AppError(`Only the leaseholder of "${name}" may renew it.`, {
      code: ERROR_CODE.NOT_OWNER,
      details: { name, caller },
      suggestions: ['Renew from the identity that holds the lease.']
    });
  }
  return record;
};
