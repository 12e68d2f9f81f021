export type Identity = string;

/** Non-negative integer amount of the registry's single unit of value. */
export type Amount = bigint;

/** Unix time in whole seconds. */
export type Timestamp = number;

export type LeaseRecord = {
  owner: Identity;
  registeredAt: Timestamp;
  durationYears: number;
  paidAmount: Amount;
};

export type RegistryConfig = {
  adminIdentity: Identity;
  pricePerYear: Amount;
  renewalMultiplier: Amount;
  paused: boolean;
};

export type LeaseStatus = 'unclaimed' | 'active' | 'lapsed';

export type LeaseView = {
  name: string;
  status: LeaseStatus;
  record: LeaseRecord | null;
  expiresAt: Timestamp | null;
};
