import { describe, expect, it } from 'vitest';

import { SECONDS_PER_YEAR } from '../../src/application/registry/LeasePolicy.js';
import { RegistryService } from '../../src/application/registry/RegistryService.js';
import { InMemoryRegistryStore } from '../../src/application/registry/RegistryStore.js';
import { CustodialLedger } from '../../src/application/registry/CustodialLedger.js';
import { FixedClock } from '../../src/infrastructure/clock/clocks.js';
import { ERROR_CODE } from '../../src/shared/errors/ErrorCode.js';
import { makeNoopLogger } from '../../src/shared/logging/logger.js';
import { T0, createHarness, errorCodeOf } from '../helpers/registry.js';

describe('RegistryService claim', () => {
  it('rejects a payment one short of price times years, then accepts the exact price', () => {
    const { service, store, ledger } = createHarness();

    expect(errorCodeOf(() => service.claim({ name: 'alpha', years: 2, caller: 'alice', amount: 199n }))).toBe(
      ERROR_CODE.INSUFFICIENT_PAYMENT
    );
    expect(store.exists('alpha')).toBe(false);
    expect(ledger.custodialBalance()).toBe(0n);

    const record = service.claim({ name: 'alpha', years: 2, caller: 'alice', amount: 200n });

    expect(record).toEqual({ owner: 'alice', registeredAt: T0, durationYears: 2, paidAmount: 200n });
    expect(service.lookupInfo('alpha')).toEqual(record);
    expect(ledger.custodialBalance()).toBe(200n);
  });

  it('keeps a two-year lease from being claimed by someone else one year in', () => {
    const { service, clock } = createHarness();
    service.claim({ name: 'alpha', years: 2, caller: 'alice', amount: 200n });

    clock.set(T0 + SECONDS_PER_YEAR);

    expect(errorCodeOf(() => service.claim({ name: 'alpha', years: 2, caller: 'bob', amount: 200n }))).toBe(
      ERROR_CODE.DOMAIN_STILL_ACTIVE
    );
    expect(service.lookupOwner('alpha')).toBe('alice');
  });

  it('treats the exact expiry second as still active and the next second as lapsed', () => {
    const { service, clock } = createHarness();
    service.claim({ name: 'alpha', years: 2, caller: 'alice', amount: 200n });

    clock.set(T0 + 2 * SECONDS_PER_YEAR);
    expect(errorCodeOf(() => service.claim({ name: 'alpha', years: 1, caller: 'bob', amount: 100n }))).toBe(
      ERROR_CODE.DOMAIN_STILL_ACTIVE
    );

    clock.set(T0 + 2 * SECONDS_PER_YEAR + 1);
    const record = service.claim({ name: 'alpha', years: 1, caller: 'bob', amount: 100n });

    expect(record).toEqual({
      owner: 'bob',
      registeredAt: T0 + 2 * SECONDS_PER_YEAR + 1,
      durationYears: 1,
      paidAmount: 100n
    });
  });

  it('lets the previous owner reclaim a lapsed name with a fresh record', () => {
    const { service, clock } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });
    service.renew({ name: 'alpha', additionalYears: 1, caller: 'alice', amount: 200n });

    clock.set(T0 + 5 * SECONDS_PER_YEAR);
    const record = service.claim({ name: 'alpha', years: 3, caller: 'alice', amount: 300n });

    expect(record.durationYears).toBe(3);
    expect(record.paidAmount).toBe(300n);
    expect(record.registeredAt).toBe(T0 + 5 * SECONDS_PER_YEAR);
  });

  it.each([0, 11, 1.5, -1])('rejects %s requested years as an invalid duration', (years) => {
    const { service } = createHarness();

    expect(errorCodeOf(() => service.claim({ name: 'alpha', years, caller: 'alice', amount: 10_000n }))).toBe(
      ERROR_CODE.INVALID_DURATION
    );
  });

  it.each([1, 10])('accepts %s requested years with sufficient payment', (years) => {
    const { service } = createHarness();

    const record = service.claim({ name: 'alpha', years, caller: 'alice', amount: BigInt(years) * 100n });
    expect(record.durationYears).toBe(years);
  });

  it('checks the lease state before the duration and the duration before the payment', () => {
    const { service } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });

    expect(errorCodeOf(() => service.claim({ name: 'alpha', years: 0, caller: 'bob', amount: 0n }))).toBe(
      ERROR_CODE.DOMAIN_STILL_ACTIVE
    );
    expect(errorCodeOf(() => service.claim({ name: 'beta', years: 11, caller: 'bob', amount: 0n }))).toBe(
      ERROR_CODE.INVALID_DURATION
    );
  });

  it('records the whole payment when the caller overpays', () => {
    const { service, ledger } = createHarness();

    const record = service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 1_000n });

    expect(record.paidAmount).toBe(1_000n);
    expect(ledger.custodialBalance()).toBe(1_000n);
  });

  it('treats a missing amount as zero value attached', () => {
    const { service } = createHarness({ pricePerYear: 0n });

    expect(service.claim({ name: 'free', years: 1, caller: 'alice' }).paidAmount).toBe(0n);
  });

  it('uses exact string keys', () => {
    const { service } = createHarness();
    service.claim({ name: 'Alpha', years: 1, caller: 'alice', amount: 100n });

    expect(service.lookupOwner('alpha')).toBeUndefined();
    expect(service.lookupOwner('Alpha ')).toBeUndefined();
    expect(service.claim({ name: 'alpha', years: 1, caller: 'bob', amount: 100n }).owner).toBe('bob');
  });

  it('emits DomainRegistered with the name, caller, payment and years', () => {
    const { service, recorder } = createHarness();

    service.claim({ name: 'alpha', years: 2, caller: 'alice', amount: 250n });

    expect(recorder.events).toEqual([
      { type: 'DomainRegistered', name: 'alpha', owner: 'alice', amount: 250n, years: 2 }
    ]);
  });

  it('emits nothing when the claim is rejected', () => {
    const { service, recorder } = createHarness();

    errorCodeOf(() => service.claim({ name: 'alpha', years: 2, caller: 'alice', amount: 1n }));

    expect(recorder.events).toEqual([]);
  });
});

describe('RegistryService renew', () => {
  it('extends a lapsed lease from its original anchor for the original owner', () => {
    const { service, clock } = createHarness();
    service.claim({ name: 'alpha', years: 2, caller: 'alice', amount: 200n });

    clock.set(T0 + 3 * SECONDS_PER_YEAR);
    const record = service.renew({ name: 'alpha', additionalYears: 1, caller: 'alice', amount: 200n });

    expect(record).toEqual({ owner: 'alice', registeredAt: T0, durationYears: 3, paidAmount: 400n });
    expect(service.lookupInfo('alpha')).toEqual(record);
  });

  it('requires price times years times multiplier', () => {
    const { service } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });

    expect(
      errorCodeOf(() => service.renew({ name: 'alpha', additionalYears: 2, caller: 'alice', amount: 399n }))
    ).toBe(ERROR_CODE.INSUFFICIENT_PAYMENT);
    expect(service.lookupInfo('alpha')?.durationYears).toBe(1);

    expect(service.renew({ name: 'alpha', additionalYears: 2, caller: 'alice', amount: 400n }).durationYears).toBe(3);
  });

  it('rejects renewals from anyone but the leaseholder', () => {
    const { service } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });

    expect(errorCodeOf(() => service.renew({ name: 'alpha', additionalYears: 1, caller: 'bob', amount: 200n }))).toBe(
      ERROR_CODE.NOT_OWNER
    );
    expect(errorCodeOf(() => service.renew({ name: 'ghost', additionalYears: 1, caller: 'bob', amount: 200n }))).toBe(
      ERROR_CODE.NOT_OWNER
    );
  });

  it('checks the duration before ownership', () => {
    const { service } = createHarness();

    expect(errorCodeOf(() => service.renew({ name: 'ghost', additionalYears: 0, caller: 'bob', amount: 0n }))).toBe(
      ERROR_CODE.INVALID_DURATION
    );
    expect(errorCodeOf(() => service.renew({ name: 'ghost', additionalYears: 11, caller: 'bob', amount: 0n }))).toBe(
      ERROR_CODE.INVALID_DURATION
    );
  });

  it('lets the total duration grow past ten years', () => {
    const { service } = createHarness();
    service.claim({ name: 'alpha', years: 10, caller: 'alice', amount: 1_000n });

    const record = service.renew({ name: 'alpha', additionalYears: 10, caller: 'alice', amount: 2_000n });

    expect(record.durationYears).toBe(20);
    expect(record.paidAmount).toBe(3_000n);
  });

  it('emits DomainRenewed and captures the payment', () => {
    const { service, recorder, ledger } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });

    service.renew({ name: 'alpha', additionalYears: 3, caller: 'alice', amount: 600n });

    expect(recorder.events.at(-1)).toEqual({ type: 'DomainRenewed', name: 'alpha', additionalYears: 3, amount: 600n });
    expect(ledger.custodialBalance()).toBe(700n);
  });

  it('cannot renew a name another caller has reclaimed', () => {
    const { service, clock } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });
    clock.set(T0 + 2 * SECONDS_PER_YEAR);
    service.claim({ name: 'alpha', years: 1, caller: 'bob', amount: 100n });

    expect(errorCodeOf(() => service.renew({ name: 'alpha', additionalYears: 1, caller: 'alice', amount: 200n }))).toBe(
      ERROR_CODE.NOT_OWNER
    );
  });
});

describe('RegistryService administration', () => {
  it('rejects price changes from a non-admin and leaves the config untouched', () => {
    const { service, recorder } = createHarness();
    const before = service.getConfig();

    expect(errorCodeOf(() => service.setPricePerYear({ caller: 'bob', newPrice: 1n }))).toBe(ERROR_CODE.UNAUTHORIZED);
    expect(errorCodeOf(() => service.setRenewalMultiplier({ caller: 'bob', newMultiplier: 9n }))).toBe(
      ERROR_CODE.UNAUTHORIZED
    );
    expect(errorCodeOf(() => service.pause({ caller: 'bob' }))).toBe(ERROR_CODE.UNAUTHORIZED);
    expect(errorCodeOf(() => service.unpause({ caller: 'bob' }))).toBe(ERROR_CODE.UNAUTHORIZED);
    expect(errorCodeOf(() => service.withdraw({ caller: 'bob' }))).toBe(ERROR_CODE.UNAUTHORIZED);

    expect(service.getConfig()).toEqual(before);
    expect(recorder.events).toEqual([]);
  });

  it('applies new pricing to later claims and renewals', () => {
    const { service, recorder } = createHarness();

    service.setPricePerYear({ caller: 'admin', newPrice: 50n });
    service.setRenewalMultiplier({ caller: 'admin', newMultiplier: 3n });

    expect(service.quoteClaim(2)).toEqual({ years: 2, required: 100n });
    expect(service.quoteRenewal(1)).toEqual({ years: 1, required: 150n });
    expect(recorder.events).toEqual([
      { type: 'PriceChanged', newPrice: 50n },
      { type: 'MultiplierChanged', newMultiplier: 3n }
    ]);
  });

  it('blocks claims and renewals while paused but keeps lookups working', () => {
    const { service } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });

    service.pause({ caller: 'admin' });

    expect(errorCodeOf(() => service.claim({ name: 'beta', years: 1, caller: 'bob', amount: 100n }))).toBe(
      ERROR_CODE.CONTRACT_PAUSED
    );
    expect(errorCodeOf(() => service.renew({ name: 'alpha', additionalYears: 1, caller: 'alice', amount: 200n }))).toBe(
      ERROR_CODE.CONTRACT_PAUSED
    );
    expect(service.lookupOwner('alpha')).toBe('alice');
    expect(service.lookupInfo('alpha')?.durationYears).toBe(1);
  });

  it('reports the pause before any lease rejection', () => {
    const { service } = createHarness({ paused: true });

    expect(errorCodeOf(() => service.claim({ name: 'beta', years: 0, caller: 'bob', amount: 0n }))).toBe(
      ERROR_CODE.CONTRACT_PAUSED
    );
  });

  it('lets admin operations run while paused', () => {
    const { service } = createHarness({ paused: true });

    expect(service.setPricePerYear({ caller: 'admin', newPrice: 7n }).pricePerYear).toBe(7n);
    expect(service.withdraw({ caller: 'admin' })).toBe(0n);
    expect(service.unpause({ caller: 'admin' }).paused).toBe(false);
    expect(service.claim({ name: 'beta', years: 1, caller: 'bob', amount: 7n }).owner).toBe('bob');
  });

  it('accepts repeated pause and unpause calls and re-emits each time', () => {
    const { service, recorder } = createHarness();

    service.pause({ caller: 'admin' });
    expect(service.pause({ caller: 'admin' }).paused).toBe(true);
    service.unpause({ caller: 'admin' });
    expect(service.unpause({ caller: 'admin' }).paused).toBe(false);

    expect(recorder.events.map((event) => event.type)).toEqual(['Paused', 'Paused', 'Unpaused', 'Unpaused']);
  });

  it('withdraws the whole custodial balance to the admin', () => {
    const { service, ledger } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 150n });
    service.deposit({ caller: 'carol', amount: 25n });

    expect(service.withdraw({ caller: 'admin' })).toBe(175n);
    expect(service.custodialBalance()).toBe(0n);
    expect(ledger.paidOutTo('admin')).toBe(175n);
    expect(service.withdraw({ caller: 'admin' })).toBe(0n);
  });

  it('rejects negative pricing values', () => {
    const { service } = createHarness();

    expect(errorCodeOf(() => service.setPricePerYear({ caller: 'admin', newPrice: -1n }))).toBe(
      ERROR_CODE.VALIDATION_ERROR
    );
    expect(service.getConfig().pricePerYear).toBe(100n);
  });

  it('does not share its config object with the caller', () => {
    const { service, config } = createHarness();

    config.pricePerYear = 1n;
    const snapshot = service.getConfig();
    snapshot.paused = true;

    expect(service.getConfig()).toEqual({
      adminIdentity: 'admin',
      pricePerYear: 100n,
      renewalMultiplier: 2n,
      paused: false
    });
  });
});

describe('RegistryService reads and deposits', () => {
  it('describes unclaimed, active and lapsed names', () => {
    const { service, clock } = createHarness();
    service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });

    expect(service.describe('ghost')).toEqual({ name: 'ghost', status: 'unclaimed', record: null, expiresAt: null });
    expect(service.describe('alpha').status).toBe('active');
    expect(service.describe('alpha').expiresAt).toBe(T0 + SECONDS_PER_YEAR);

    clock.advance(SECONDS_PER_YEAR + 1);
    expect(service.describe('alpha').status).toBe('lapsed');
  });

  it('rejects quotes for out-of-range durations', () => {
    const { service } = createHarness();

    expect(errorCodeOf(() => service.quoteClaim(0))).toBe(ERROR_CODE.INVALID_DURATION);
    expect(errorCodeOf(() => service.quoteRenewal(11))).toBe(ERROR_CODE.INVALID_DURATION);
  });

  it('accepts deposits without touching records or emitting events', () => {
    const { service, recorder } = createHarness({ paused: true });

    expect(service.deposit({ caller: 'carol', amount: 40n })).toBe(40n);
    expect(recorder.events).toEqual([]);
    expect(service.lookupOwner('carol')).toBeUndefined();
  });

  it('returns copies of stored records', () => {
    const { service } = createHarness();
    const record = service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });

    record.durationYears = 99;
    const looked = service.lookupInfo('alpha');
    if (looked) {
      looked.owner = 'mallory';
    }

    expect(service.lookupInfo('alpha')).toEqual({ owner: 'alice', registeredAt: T0, durationYears: 1, paidAmount: 100n });
  });
});

describe('RegistryService event sink failures', () => {
  it('commits the mutation even when the sink throws', () => {
    const store = new InMemoryRegistryStore();
    const ledger = new CustodialLedger();
    const service = new RegistryService({
      config: { adminIdentity: 'admin', pricePerYear: 100n, renewalMultiplier: 2n, paused: false },
      store,
      ledger,
      clock: new FixedClock(T0),
      events: {
        emit: () => {
          throw new Error('sink offline');
        }
      },
      logger: makeNoopLogger()
    });

    const record = service.claim({ name: 'alpha', years: 1, caller: 'alice', amount: 100n });

    expect(store.get('alpha')).toEqual(record);
    expect(ledger.custodialBalance()).toBe(100n);
    expect(service.pause({ caller: 'admin' }).paused).toBe(true);
  });
});
