import { z } from 'zod';

import type { LedgerSnapshot } from '../../application/registry/CustodialLedger.js';
import type { RegistryStoreSnapshot } from '../../application/registry/RegistryStore.js';
import type { LeaseRecord, RegistryConfig } from '../../application/registry/types.js';
import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import { AtomicJsonFile } from './AtomicJsonFile.js';

export const STATE_FILE_VERSION = 1;

const amountText = z.string().regex(/^\d+$/);

const stateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  config: z.object({
    adminIdentity: z.string().min(1),
    pricePerYear: amountText,
    renewalMultiplier: amountText,
    paused: z.boolean()
  }),
  // Arrays rather than keyed objects: a name such as "__proto__" must survive JSON and zod.
  records: z.array(
    z.object({
      name: z.string(),
      owner: z.string().min(1),
      registeredAt: z.number().int().nonnegative(),
      durationYears: z.number().int().positive(),
      paidAmount: amountText
    })
  ).refine((records) => new Set(records.map((record) => record.name)).size === records.length, {
    message: 'duplicate record name'
  }),
  ledger: z.object({
    custodialBalance: amountText,
    payouts: z.array(z.object({ identity: z.string(), amount: amountText }))
  })
});

type StateFileContent = z.infer<typeof stateFileSchema>;

export type RegistryState = {
  config: RegistryConfig;
  records: RegistryStoreSnapshot;
  ledger: LedgerSnapshot;
};

export const decodeState = (content: StateFileContent): RegistryState => ({
  config: {
    adminIdentity: content.config.adminIdentity,
    pricePerYear: BigInt(content.config.pricePerYear),
    renewalMultiplier: BigInt(content.config.renewalMultiplier),
    paused: content.config.paused
  },
  records: content.records.map((record): [string, LeaseRecord] => [
    record.name,
    {
      owner: record.owner,
      registeredAt: record.registeredAt,
      durationYears: record.durationYears,
      paidAmount: BigInt(record.paidAmount)
    }
  ]),
  ledger: {
    custodialBalance: BigInt(content.ledger.custodialBalance),
    payouts: content.ledger.payouts.map((payout): [string, bigint] => [payout.identity, BigInt(payout.amount)])
  }
});

export const encodeState = (state: RegistryState): StateFileContent => ({
  version: STATE_FILE_VERSION,
  config: {
    adminIdentity: state.config.adminIdentity,
    pricePerYear: state.config.pricePerYear.toString(),
    renewalMultiplier: state.config.renewalMultiplier.toString(),
    paused: state.config.paused
  },
  records: state.records.map(([name, record]) => ({
    name,
    owner: record.owner,
    registeredAt: record.registeredAt,
    durationYears: record.durationYears,
    paidAmount: record.paidAmount.toString()
  })),
  ledger: {
    custodialBalance: state.ledger.custodialBalance.toString(),
    payouts: state.ledger.payouts.map(([identity, amount]) => ({ identity, amount: amount.toString() }))
  }
});

/** The registry's whole persisted state in one JSON document. */
export class RegistryStateFile {
  public constructor(private readonly filePath: string) {}

  public async exists(): Promise<boolean> {
    try {
      return await AtomicJsonFile.exists(this.filePath);
    } catch (error) {
      throw this.corrupted(error);
    }
  }

  public async load(): Promise<RegistryState> {
    let raw: unknown;
    try {
      raw = await AtomicJsonFile.read(this.filePath);
    } catch (error) {
      throw this.corrupted(error);
    }

    if (raw === null) {
      throw new AppError('Registry has not been initialized.', {
        code: ERROR_CODE.REGISTRY_NOT_INITIALIZED,
        details: { filePath: this.filePath },
        suggestions: ['Run: nlr init --price <amount> --multiplier <factor> --as <admin>']
      });
    }

    const parsed = stateFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.corrupted(parsed.error);
    }
    return decodeState(parsed.data);
  }

  public async save(state: RegistryState): Promise<void> {
    await AtomicJsonFile.write(this.filePath, encodeState(state));
  }

  private corrupted(cause: unknown): AppError {
    return new AppError('Registry state file is unreadable.', {
      code: ERROR_CODE.STATE_CORRUPTED,
      details: {
        filePath: this.filePath,
        reason: cause instanceof Error ? cause.message : String(cause)
      },
      suggestions: ['Restore state.json from a backup or re-initialize the registry in a new home directory.'],
      cause
    });
  }
}
