import type { RegistryEvent } from './events.js';
import type { Amount, Identity, Timestamp } from './types.js';

export interface Clock {
  now(): Timestamp;
}

/**
 * Receives notifications after the mutation that produced them has been
 * applied. Emission is fire-and-forget: a throwing sink never fails the
 * operation.
 */
export interface EventSink {
  emit(event: RegistryEvent): void;
}

/**
 * Custody of the value attached to calls. The registry only decides who may
 * withdraw; moving funds is the ledger's job.
 */
export interface ValueLedger {
  capture(from: Identity, amount: Amount): void;
  custodialBalance(): Amount;
  /** Moves the entire custodial balance to `to` and returns the amount moved. */
  payout(to: Identity): Amount;
}
