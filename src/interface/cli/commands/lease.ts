import type { Command } from 'commander';

import { expiresAt } from '../../../application/registry/LeasePolicy.js';
import { AppError } from '../../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../../shared/errors/ErrorCode.js';
import { amountSchema, domainNameSchema, yearsSchema } from '../../../shared/schema/common.js';
import { requireCaller } from '../context.js';
import {
  okResponse,
  openSession,
  parseInput,
  toEventTypes,
  toRecordView,
  type ContextProvider,
  type ResponseHandler
} from './common.js';

type PaymentOptions = {
  years: string;
  amount: string;
};

export type QuoteKind = 'claim' | 'renew';

export const parseQuoteKind = (value: string): QuoteKind => {
  if (value === 'claim' || value === 'renew') {
    return value;
  }
  throw new AppError(`Unknown quote kind: ${value}`, {
    code: ERROR_CODE.VALIDATION_ERROR,
    details: { kind: value },
    suggestions: ['Use: nlr quote claim --years <n> or nlr quote renew --years <n>']
  });
};

export const registerLeaseCommands = (
  root: Command,
  getCtx: ContextProvider,
  onResponse: ResponseHandler
): void => {
  root
    .command('claim')
    .description('Claim a name that is unclaimed or whose lease has lapsed')
    .argument('<name>', 'domain name (exact key)')
    .requiredOption('--years <n>', 'lease length in years (1-10)')
    .option('--amount <value>', 'value attached to the call', '0')
    .action(async (rawName: string, opts: PaymentOptions) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const caller = requireCaller(ctx);
      const name = parseInput(domainNameSchema, rawName, 'name');
      const years = parseInput(yearsSchema, opts.years, '--years');
      const amount = parseInput(amountSchema, opts.amount, '--amount');

      const { result, events } = await openSession(ctx).mutate((service) =>
        service.claim({ name, years, caller, amount })
      );

      await onResponse(
        okResponse(
          'claim',
          { name, record: toRecordView(result), expiresAt: expiresAt(result), events: toEventTypes(events) },
          `claimed ${name} for ${caller} (${years}y, paid ${amount.toString()})`,
          startedAt
        )
      );
    });

  root
    .command('renew')
    .description('Extend a lease held by the caller, lapsed or not')
    .argument('<name>', 'domain name (exact key)')
    .requiredOption('--years <n>', 'additional years (1-10)')
    .option('--amount <value>', 'value attached to the call', '0')
    .action(async (rawName: string, opts: PaymentOptions) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const caller = requireCaller(ctx);
      const name = parseInput(domainNameSchema, rawName, 'name');
      const additionalYears = parseInput(yearsSchema, opts.years, '--years');
      const amount = parseInput(amountSchema, opts.amount, '--amount');

      const { result, events } = await openSession(ctx).mutate((service) =>
        service.renew({ name, additionalYears, caller, amount })
      );

      await onResponse(
        okResponse(
          'renew',
          { name, record: toRecordView(result), expiresAt: expiresAt(result), events: toEventTypes(events) },
          `renewed ${name} to ${result.durationYears}y total`,
          startedAt
        )
      );
    });

  root
    .command('owner')
    .description('Show the current leaseholder of a name')
    .argument('<name>', 'domain name (exact key)')
    .action(async (rawName: string) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const name = parseInput(domainNameSchema, rawName, 'name');

      const owner = await openSession(ctx).read((service) => service.lookupOwner(name));
      await onResponse(okResponse('owner', { name, owner: owner ?? null }, owner ?? 'unclaimed', startedAt));
    });

  root
    .command('info')
    .description('Show the stored lease record of a name')
    .argument('<name>', 'domain name (exact key)')
    .action(async (rawName: string) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const name = parseInput(domainNameSchema, rawName, 'name');

      const record = await openSession(ctx).read((service) => service.lookupInfo(name));
      const text = record
        ? [
            `owner: ${record.owner}`,
            `registeredAt: ${record.registeredAt}`,
            `durationYears: ${record.durationYears}`,
            `paidAmount: ${record.paidAmount.toString()}`
          ].join('\n')
        : 'unclaimed';

      await onResponse(okResponse('info', { name, record: record ? toRecordView(record) : null }, text, startedAt));
    });

  root
    .command('status')
    .description('Show whether a name is unclaimed, active or lapsed')
    .argument('<name>', 'domain name (exact key)')
    .action(async (rawName: string) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const name = parseInput(domainNameSchema, rawName, 'name');

      const view = await openSession(ctx).read((service) => service.describe(name));
      const text = view.expiresAt === null ? view.status : `${view.status} (expires at ${view.expiresAt})`;

      await onResponse(
        okResponse(
          'status',
          {
            name,
            status: view.status,
            expiresAt: view.expiresAt,
            record: view.record ? toRecordView(view.record) : null
          },
          text,
          startedAt
        )
      );
    });

  root
    .command('quote')
    .description('Show the minimum payment for a claim or a renewal')
    .argument('<kind>', 'claim | renew')
    .requiredOption('--years <n>', 'lease length in years (1-10)')
    .action(async (rawKind: string, opts: { years: string }) => {
      const startedAt = Date.now();
      const ctx = getCtx();
      const kind = parseQuoteKind(rawKind);
      const years = parseInput(yearsSchema, opts.years, '--years');

      const quote = await openSession(ctx).read((service) =>
        kind === 'claim' ? service.quoteClaim(years) : service.quoteRenewal(years)
      );

      await onResponse(
        okResponse(
          'quote',
          { kind, years: quote.years, required: quote.required.toString() },
          quote.required.toString(),
          startedAt
        )
      );
    });
};
