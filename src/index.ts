export { RegistryService } from './application/registry/RegistryService.js';
export type { CallContext, ClaimInput, QuoteResult, RegistryServiceOptions, RenewInput } from './application/registry/RegistryService.js';
export { InMemoryRegistryStore } from './application/registry/RegistryStore.js';
export type { RegistryStore, RegistryStoreSnapshot } from './application/registry/RegistryStore.js';
export { CustodialLedger } from './application/registry/CustodialLedger.js';
export type { LedgerSnapshot } from './application/registry/CustodialLedger.js';
export { AccessGate } from './application/registry/AccessGate.js';
export {
  MAX_LEASE_YEARS,
  MIN_LEASE_YEARS,
  SECONDS_PER_YEAR,
  claimPrice,
  expiresAt,
  isLapsed,
  leaseStatus,
  renewalPrice
} from './application/registry/LeasePolicy.js';
export type { Clock, EventSink, ValueLedger } from './application/registry/collaborators.js';
export { REGISTRY_EVENT_TYPES } from './application/registry/events.js';
export type { RegistryEvent, RegistryEventType } from './application/registry/events.js';
export type {
  Amount,
  Identity,
  LeaseRecord,
  LeaseStatus,
  LeaseView,
  RegistryConfig,
  Timestamp
} from './application/registry/types.js';
export { RegistrySession } from './application/session/RegistrySession.js';
export type { InitializeInput, RegistrySessionOptions, TransactionResult } from './application/session/RegistrySession.js';
export { FixedClock, SystemClock } from './infrastructure/clock/clocks.js';
export { AppError, hasErrorCode, isAppError } from './shared/errors/AppError.js';
export { ERROR_CODE, ERROR_CODES } from './shared/errors/ErrorCode.js';
export type { ErrorCode } from './shared/errors/ErrorCode.js';
