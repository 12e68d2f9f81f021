import type { Command } from 'commander';

import { amountSchema, limitSchema } from '../../../shared/schema/common.js';
import { requireCaller } from '../context.js';
import { okResponse, openSession, parseInput, type ContextProvider, type ResponseHandler } from './common.js';

export const registerLedgerCommands = (
  root: Command,
  getCtx: ContextProvider,
  onResponse: ResponseHandler
): void => {
  root
    .command('deposit')
    .description('Send value to the registry without claiming or renewing')
    .requiredOption('--amount <value>', 'value attached to the call')
    .action(async (opts: { amount: string }) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const caller = requireCaller(ctx);
      const amount = parseInput(amountSchema, opts.amount, '--amount');

      const { result } = await openSession(ctx).mutate((service) => service.deposit({ caller, amount }));
      await onResponse(
        okResponse(
          'deposit',
          { amount: amount.toString(), custodialBalance: result.toString() },
          `deposited ${amount.toString()}`,
          startedAt
        )
      );
    });

  root
    .command('balance')
    .description('Show the custodial balance awaiting withdrawal')
    .action(async () => {
      const startedAt = Date.now();
      const ctx = getCtx();

      const balance = await openSession(ctx).read((service) => service.custodialBalance());
      await onResponse(
        okResponse('balance', { custodialBalance: balance.toString() }, balance.toString(), startedAt)
      );
    });

  root
    .command('events')
    .description('Show the most recent registry notifications')
    .option('--limit <n>', 'number of entries', '20')
    .action(async (opts: { limit: string }) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const limit = parseInput(limitSchema, opts.limit, '--limit');

      const events = await openSession(ctx).recentEvents(limit);
      const text =
        events.length === 0
          ? 'no events'
          : events.map((entry) => `${entry.recordedAt} ${entry.type} ${JSON.stringify(entry.data)}`).join('\n');

      await onResponse(okResponse('events', { events }, text, startedAt));
    });
};
