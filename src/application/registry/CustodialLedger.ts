import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import type { ValueLedger } from './collaborators.js';
import type { Amount, Identity } from './types.js';

export type LedgerSnapshot = {
  custodialBalance: Amount;
  payouts: Array<[identity: Identity, amount: Amount]>;
};

/** Holds captured payments until the administrator withdraws them. */
export class CustodialLedger implements ValueLedger {
  private balance: Amount;
  private readonly payouts: Map<Identity, Amount>;

  public constructor(snapshot: LedgerSnapshot = { custodialBalance: 0n, payouts: [] }) {
    this.balance = snapshot.custodialBalance;
    this.payouts = new Map(snapshot.payouts);
  }

  public capture(from: Identity, amount: Amount): void {
    if (amount < 0n) {
      throw new AppError('Attached value cannot be negative.', {
        code: ERROR_CODE.VALIDATION_ERROR,
        details: { from, amount: amount.toString() }
      });
    }
    this.balance += amount;
  }

  public custodialBalance(): Amount {
    return this.balance;
  }

  public payout(to: Identity): Amount {
    const amount = this.balance;
    this.balance = 0n;
    this.payouts.set(to, (this.payouts.get(to) ?? 0n) + amount);
    return amount;
  }

  public paidOutTo(identity: Identity): Amount {
    return this.payouts.get(identity) ?? 0n;
  }

  public toSnapshot(): LedgerSnapshot {
    return {
      custodialBalance: this.balance,
      payouts: [...this.payouts]
    };
  }
}
