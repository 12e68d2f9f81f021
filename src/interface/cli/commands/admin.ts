import type { Command } from 'commander';

import { amountSchema, identitySchema } from '../../../shared/schema/common.js';
import { requireCaller } from '../context.js';
import {
  okResponse,
  openSession,
  parseInput,
  toConfigView,
  toEventTypes,
  type ContextProvider,
  type ResponseHandler
} from './common.js';

type InitOptions = {
  price: string;
  multiplier: string;
  admin?: string;
};

export const registerAdminCommands = (
  root: Command,
  getCtx: ContextProvider,
  onResponse: ResponseHandler
): void => {
  root
    .command('init')
    .description('Create the registry state with its administrator and pricing')
    .requiredOption('--price <amount>', 'price per year')
    .requiredOption('--multiplier <factor>', 'renewal price multiplier')
    .option('--admin <identity>', 'administrator identity (default: the caller)')
    .action(async (opts: InitOptions) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const adminIdentity =
        opts.admin === undefined ? requireCaller(ctx) : parseInput(identitySchema, opts.admin, '--admin');
      const pricePerYear = parseInput(amountSchema, opts.price, '--price');
      const renewalMultiplier = parseInput(amountSchema, opts.multiplier, '--multiplier');

      const session = openSession(ctx);
      const config = await session.initialize({ adminIdentity, pricePerYear, renewalMultiplier });

      await onResponse(
        okResponse(
          'init',
          { homeDir: session.home, config: toConfigView(config) },
          `registry initialized at ${session.home} (admin ${adminIdentity})`,
          startedAt
        )
      );
    });

  root
    .command('config')
    .description('Show the registry configuration')
    .action(async () => {
      const startedAt = Date.now();
      const ctx = getCtx();

      const config = await openSession(ctx).read((service) => service.getConfig());
      const text = [
        `admin: ${config.adminIdentity}`,
        `pricePerYear: ${config.pricePerYear.toString()}`,
        `renewalMultiplier: ${config.renewalMultiplier.toString()}`,
        `paused: ${config.paused}`
      ].join('\n');

      await onResponse(okResponse('config', { config: toConfigView(config) }, text, startedAt));
    });

  root
    .command('set-price')
    .description('Change the price per year (admin)')
    .argument('<amount>', 'new price per year')
    .action(async (rawAmount: string) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const caller = requireCaller(ctx);
      const newPrice = parseInput(amountSchema, rawAmount, 'amount');

      const { result, events } = await openSession(ctx).mutate((service) =>
        service.setPricePerYear({ caller, newPrice })
      );

      await onResponse(
        okResponse(
          'set-price',
          { config: toConfigView(result), events: toEventTypes(events) },
          `price per year set to ${newPrice.toString()}`,
          startedAt
        )
      );
    });

  root
    .command('set-multiplier')
    .description('Change the renewal price multiplier (admin)')
    .argument('<factor>', 'new renewal multiplier')
    .action(async (rawFactor: string) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const caller = requireCaller(ctx);
      const newMultiplier = parseInput(amountSchema, rawFactor, 'factor');

      const { result, events } = await openSession(ctx).mutate((service) =>
        service.setRenewalMultiplier({ caller, newMultiplier })
      );

      await onResponse(
        okResponse(
          'set-multiplier',
          { config: toConfigView(result), events: toEventTypes(events) },
          `renewal multiplier set to ${newMultiplier.toString()}`,
          startedAt
        )
      );
    });

  root
    .command('pause')
    .description('Stop claims and renewals (admin)')
    .action(async () => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const caller = requireCaller(ctx);

      const { result, events } = await openSession(ctx).mutate((service) => service.pause({ caller }));
      await onResponse(
        okResponse('pause', { config: toConfigView(result), events: toEventTypes(events) }, 'paused', startedAt)
      );
    });

  root
    .command('unpause')
    .description('Resume claims and renewals (admin)')
    .action(async () => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const caller = requireCaller(ctx);

      const { result, events } = await openSession(ctx).mutate((service) => service.unpause({ caller }));
      await onResponse(
        okResponse('unpause', { config: toConfigView(result), events: toEventTypes(events) }, 'unpaused', startedAt)
      );
    });

  root
    .command('withdraw')
    .description('Move the whole custodial balance to the administrator (admin)')
    .action(async () => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const caller = requireCaller(ctx);

      const { result } = await openSession(ctx).mutate((service) => ({
        amount: service.withdraw({ caller }),
        to: service.getConfig().adminIdentity
      }));

      await onResponse(
        okResponse(
          'withdraw',
          { amount: result.amount.toString(), to: result.to },
          `withdrew ${result.amount.toString()} to ${result.to}`,
          startedAt
        )
      );
    });
};
