import type { z } from 'zod';

import { RegistrySession } from '../../../application/session/RegistrySession.js';
import type { LeaseRecord, RegistryConfig } from '../../../application/registry/types.js';
import { FixedClock, SystemClock } from '../../../infrastructure/clock/clocks.js';
import { AppError } from '../../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../../shared/errors/ErrorCode.js';
import { makeLogger } from '../../../shared/logging/logger.js';
import type { CommandContext } from '../context.js';
import type { RenderableResponse } from '../output.js';

export type ResponseHandler = (response: RenderableResponse) => Promise<void>;

export type ContextProvider = () => CommandContext;

export const parseInput = <S extends z.ZodTypeAny>(schema: S, value: unknown, field: string): z.output<S> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'invalid value';
    throw new AppError(`Invalid ${field}: ${reason}`, {
      code: ERROR_CODE.VALIDATION_ERROR,
      details: { field, value: typeof value === 'string' ? value : String(value) }
    });
  }
  return parsed.data;
};

export const openSession = (ctx: CommandContext): RegistrySession =>
  new RegistrySession({
    homeDir: ctx.homeDir,
    clock: ctx.now === undefined ? new SystemClock() : new FixedClock(ctx.now),
    logger: makeLogger({ component: 'cli' }, ctx.logLevel)
  });

export const toRecordView = (record: LeaseRecord): Record<string, unknown> => ({
  owner: record.owner,
  registeredAt: record.registeredAt,
  durationYears: record.durationYears,
  paidAmount: record.paidAmount.toString()
});

export const toConfigView = (config: RegistryConfig): Record<string, unknown> => ({
  adminIdentity: config.adminIdentity,
  pricePerYear: config.pricePerYear.toString(),
  renewalMultiplier: config.renewalMultiplier.toString(),
  paused: config.paused
});

export const toEventTypes = (events: Array<{ type: string }>): string[] => events.map((event) => event.type);

export const okResponse = (
  id: string,
  data: Record<string, unknown>,
  text: string,
  startedAt: number
): RenderableResponse => ({
  id,
  ok: true,
  data,
  meta: { durationMs: Math.max(0, Date.now() - startedAt) },
  text
});
