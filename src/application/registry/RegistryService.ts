import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import { makeLogger, type Logger } from '../../shared/logging/logger.js';
import { AccessGate } from './AccessGate.js';
import type { Clock, EventSink, ValueLedger } from './collaborators.js';
import type { RegistryEvent } from './events.js';
import {
  assertClaimable,
  assertLeaseOwner,
  assertSufficientPayment,
  assertValidDuration,
  claimPrice,
  expiresAt,
  leaseStatus,
  renewalPrice
} from './LeasePolicy.js';
import type { RegistryStore } from './RegistryStore.js';
import type { Amount, Identity, LeaseRecord, LeaseView, RegistryConfig } from './types.js';

export type RegistryServiceOptions = {
  config: RegistryConfig;
  store: RegistryStore;
  ledger: ValueLedger;
  clock: Clock;
  events: EventSink;
  logger?: Logger;
};

/** Identity of the caller and the value attached to the call. */
export type CallContext = {
  caller: Identity;
  amount?: Amount;
};

export type ClaimInput = CallContext & {
  name: string;
  years: number;
};

export type RenewInput = CallContext & {
  name: string;
  additionalYears: number;
};

export type QuoteResult = {
  years: number;
  required: Amount;
};

/**
 * The leasing state machine. Every public method is synchronous and runs all
 * of its checks before its first write, so a rejected call leaves the store,
 * the config and the ledger untouched.
 */
export class RegistryService {
  private readonly config: RegistryConfig;
  private readonly store: RegistryStore;
  private readonly ledger: ValueLedger;
  private readonly clock: Clock;
  private readonly events: EventSink;
  private readonly gate: AccessGate;
  private readonly logger: Logger;

  public constructor(options: RegistryServiceOptions) {
    this.config = { ...options.config };
    this.store = options.store;
    this.ledger = options.ledger;
    this.clock = options.clock;
    this.events = options.events;
    this.gate = new AccessGate(this.config);
    this.logger = options.logger ?? makeLogger({ component: 'registry' });
  }

  public claim(input: ClaimInput): LeaseRecord {
    const payment = input.amount ?? 0n;
    const now = this.clock.now();

    this.gate.assertNotPaused();
    assertClaimable(input.name, this.store.get(input.name), now);
    assertValidDuration(input.years);
    assertSufficientPayment(payment, claimPrice(this.config, input.years));

    const record: LeaseRecord = {
      owner: input.caller,
      registeredAt: now,
      durationYears: input.years,
      paidAmount: payment
    };

    this.ledger.capture(input.caller, payment);
    this.store.put(input.name, record);
    this.emit({
      type: 'DomainRegistered',
      name: input.name,
      owner: input.caller,
      amount: payment,
      years: input.years
    });

    return record;
  }

  public renew(input: RenewInput): LeaseRecord {
    const payment = input.amount ?? 0n;

    this.gate.assertNotPaused();
    assertValidDuration(input.additionalYears);
    const current = assertLeaseOwner(input.name, this.store.get(input.name), input.caller);
    assertSufficientPayment(payment, renewalPrice(this.config, input.additionalYears));

    const record: LeaseRecord = {
      ...current,
      durationYears: current.durationYears + input.additionalYears,
      paidAmount: current.paidAmount + payment
    };

    this.ledger.capture(input.caller, payment);
    this.store.put(input.name, record);
    this.emit({
      type: 'DomainRenewed',
      name: input.name,
      additionalYears: input.additionalYears,
      amount: payment
    });

    return record;
  }

  public lookupOwner(name: string): Identity | undefined {
    return this.store.get(name)?.owner;
  }

  public lookupInfo(name: string): LeaseRecord | undefined {
    return this.store.get(name);
  }

  public describe(name: string): LeaseView {
    const record = this.store.get(name);
    return {
      name,
      status: leaseStatus(record, this.clock.now()),
      record: record ?? null,
      expiresAt: record ? expiresAt(record) : null
    };
  }

  public quoteClaim(years: number): QuoteResult {
    assertValidDuration(years);
    return { years, required: claimPrice(this.config, years) };
  }

  public quoteRenewal(years: number): QuoteResult {
    assertValidDuration(years);
    return { years, required: renewalPrice(this.config, years) };
  }

  public getConfig(): RegistryConfig {
    return { ...this.config };
  }

  public custodialBalance(): Amount {
    return this.ledger.custodialBalance();
  }

  public setPricePerYear(input: CallContext & { newPrice: Amount }): RegistryConfig {
    this.gate.assertAdmin(input.caller);
    assertNonNegative('pricePerYear', input.newPrice);

    this.config.pricePerYear = input.newPrice;
    this.emit({ type: 'PriceChanged', newPrice: input.newPrice });
    return this.getConfig();
  }

  public setRenewalMultiplier(input: CallContext & { newMultiplier: Amount }): RegistryConfig {
    this.gate.assertAdmin(input.caller);
    assertNonNegative('renewalMultiplier', input.newMultiplier);

    this.config.renewalMultiplier = input.newMultiplier;
    this.emit({ type: 'MultiplierChanged', newMultiplier: input.newMultiplier });
    return this.getConfig();
  }

  // Repeating pause() or unpause() is allowed and re-emits the notification.
  public pause(input: CallContext): RegistryConfig {
    this.gate.assertAdmin(input.caller);

    this.config.paused = true;
    this.emit({ type: 'Paused', account: input.caller });
    return this.getConfig();
  }

  public unpause(input: CallContext): RegistryConfig {
    this.gate.assertAdmin(input.caller);

    this.config.paused = false;
    this.emit({ type: 'Unpaused', account: input.caller });
    return this.getConfig();
  }

  public withdraw(input: CallContext): Amount {
    this.gate.assertAdmin(input.caller);
    return this.ledger.payout(this.config.adminIdentity);
  }

  /** Accepts value with no lease or config change. */
  public deposit(input: CallContext): Amount {
    this.ledger.capture(input.caller, input.amount ?? 0n);
    return this.ledger.custodialBalance();
  }

  private emit(event: RegistryEvent): void {
    try {
      this.events.emit(event);
    } catch (error) {
      this.logger.warn(
        { eventType: event.type, reason: error instanceof Error ? error.message : String(error) },
        'event sink rejected notification'
      );
    }
  }
}

const assertNonNegative = (field: string, value: Amount): void => {
  if (value < 0n) {
    throw new AppError(`${field} cannot be negative.`, {
      code: ERROR_CODE.VALIDATION_ERROR,
      details: { field, value: value.toString() }
    });
  }
};
