import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * JSON logger on stderr; stdout is reserved for response envelopes.
 * Silenced under Vitest and NODE_ENV=test.
 */
export const makeLogger = (bindings: Record<string, unknown> = {}, level?: string): Logger => {
  const isTestTooling = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';
  if (isTestTooling) {
    return makeNoopLogger();
  }

  return pino(
    {
      level: level ?? process.env.NLR_LOG_LEVEL ?? 'warn',
      base: { ...bindings, app: 'name-lease-registry' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: 2, sync: true })
  );
};

export const makeNoopLogger = (): Logger => pino({ enabled: false });
