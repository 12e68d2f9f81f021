import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import { makeLogger, type Logger } from '../../shared/logging/logger.js';
import { SystemClock } from '../../infrastructure/clock/clocks.js';
import { EventLogFile, type LoggedEvent } from '../../infrastructure/store/EventLogFile.js';
import { LockFile } from '../../infrastructure/store/LockFile.js';
import { RegistryStateFile, type RegistryState } from '../../infrastructure/store/RegistryStateFile.js';
import {
  resolveEventLogPath,
  resolveLockPath,
  resolveRegistryHome,
  resolveStatePath
} from '../../infrastructure/store/paths.js';
import type { Clock } from '../registry/collaborators.js';
import { CustodialLedger } from '../registry/CustodialLedger.js';
import type { RegistryEvent } from '../registry/events.js';
import { InMemoryRegistryStore } from '../registry/RegistryStore.js';
import { RegistryService } from '../registry/RegistryService.js';
import type { Amount, Identity, RegistryConfig } from '../registry/types.js';
import { BufferedEventSink } from './BufferedEventSink.js';

export type RegistrySessionOptions = {
  homeDir?: string;
  clock?: Clock;
  logger?: Logger;
  lockTimeoutMs?: number;
};

export type InitializeInput = {
  adminIdentity: Identity;
  pricePerYear: Amount;
  renewalMultiplier: Amount;
};

export type TransactionResult<T> = {
  result: T;
  events: RegistryEvent[];
};

type LoadedRegistry = {
  service: RegistryService;
  store: InMemoryRegistryStore;
  ledger: CustodialLedger;
  sink: BufferedEventSink;
};

/**
 * Runs registry operations against the state kept under the home directory.
 * Each mutation holds the registry lock for its whole load-run-save cycle, so
 * concurrent invocations are applied one at a time and a rejected operation
 * writes nothing.
 */
export class RegistrySession {
  private readonly homeDir: string;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly lockTimeoutMs: number;
  private readonly stateFile: RegistryStateFile;
  private readonly eventLog: EventLogFile;
  private readonly lock: LockFile;

  public constructor(options: RegistrySessionOptions = {}) {
    this.homeDir = options.homeDir ?? resolveRegistryHome();
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? makeLogger({ component: 'session' });
    this.lockTimeoutMs = options.lockTimeoutMs ?? 2_000;
    this.stateFile = new RegistryStateFile(resolveStatePath(this.homeDir));
    this.eventLog = new EventLogFile(resolveEventLogPath(this.homeDir));
    this.lock = new LockFile(resolveLockPath(this.homeDir));
  }

  public get home(): string {
    return this.homeDir;
  }

  public async initialize(input: InitializeInput): Promise<RegistryConfig> {
    if (input.pricePerYear < 0n || input.renewalMultiplier < 0n) {
      throw new AppError('Price and multiplier must be non-negative.', {
        code: ERROR_CODE.VALIDATION_ERROR,
        details: {
          pricePerYear: input.pricePerYear.toString(),
          renewalMultiplier: input.renewalMultiplier.toString()
        }
      });
    }

    return this.lock.withLock(async () => {
      if (await this.stateFile.exists()) {
        throw new AppError('Registry is already initialized.', {
          code: ERROR_CODE.REGISTRY_ALREADY_INITIALIZED,
          details: { homeDir: this.homeDir },
          suggestions: ['Use a different --home, or change settings with set-price / set-multiplier.']
        });
      }

      const config: RegistryConfig = {
        adminIdentity: input.adminIdentity,
        pricePerYear: input.pricePerYear,
        renewalMultiplier: input.renewalMultiplier,
        paused: false
      };
      await this.stateFile.save({
        config,
        records: [],
        ledger: { custodialBalance: 0n, payouts: [] }
      });

      this.logger.info({ homeDir: this.homeDir, admin: config.adminIdentity }, 'registry initialized');
      return { ...config };
    }, this.lockTimeoutMs);
  }

  /** Runs a read-only task against the last committed state. */
  public async read<T>(task: (service: RegistryService) => T): Promise<T> {
    const loaded = this.build(await this.stateFile.load());
    return task(loaded.service);
  }

  public async mutate<T>(task: (service: RegistryService) => T): Promise<TransactionResult<T>> {
    return this.lock.withLock(async () => {
      const loaded = this.build(await this.stateFile.load());
      const result = task(loaded.service);

      await this.stateFile.save(this.snapshot(loaded));
      const events = loaded.sink.drain();
      await this.publish(events);

      return { result, events };
    }, this.lockTimeoutMs);
  }

  public async recentEvents(limit: number): Promise<LoggedEvent[]> {
    return this.eventLog.tail(limit);
  }

  private build(state: RegistryState): LoadedRegistry {
    const store = new InMemoryRegistryStore(state.records);
    const ledger = new CustodialLedger(state.ledger);
    const sink = new BufferedEventSink();
    const service = new RegistryService({
      config: state.config,
      store,
      ledger,
      clock: this.clock,
      events: sink,
      logger: this.logger
    });

    return { service, store, ledger, sink };
  }

  private snapshot(loaded: LoadedRegistry): RegistryState {
    return {
      config: loaded.service.getConfig(),
      records: loaded.store.toSnapshot(),
      ledger: loaded.ledger.toSnapshot()
    };
  }

  // The state is already committed here; a failing event log is reported, not rethrown.
  private async publish(events: RegistryEvent[]): Promise<void> {
    for (const event of events) {
      this.logger.info({ eventType: event.type }, 'registry event');
    }

    try {
      await this.eventLog.append(events);
    } catch (error) {
      this.logger.error(
        { reason: error instanceof Error ? error.message : String(error), count: events.length },
        'failed to append events to log'
      );
    }
  }
}
