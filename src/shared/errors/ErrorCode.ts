export const ERROR_CODE = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  DOMAIN_STILL_ACTIVE: 'DOMAIN_STILL_ACTIVE',
  INVALID_DURATION: 'INVALID_DURATION',
  INSUFFICIENT_PAYMENT: 'INSUFFICIENT_PAYMENT',
  NOT_OWNER: 'NOT_OWNER',
  UNAUTHORIZED: 'UNAUTHORIZED',
  CONTRACT_PAUSED: 'CONTRACT_PAUSED',
  REGISTRY_NOT_INITIALIZED: 'REGISTRY_NOT_INITIALIZED',
  REGISTRY_ALREADY_INITIALIZED: 'REGISTRY_ALREADY_INITIALIZED',
  REGISTRY_LOCK_TIMEOUT: 'REGISTRY_LOCK_TIMEOUT',
  STATE_CORRUPTED: 'STATE_CORRUPTED',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const;

export type ErrorCode = (typeof ERROR_CODE)[keyof typeof ERROR_CODE];

export const ERROR_CODES: readonly ErrorCode[] = Object.values(ERROR_CODE);
