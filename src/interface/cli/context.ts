import { readEnv, type RegistryEnv } from '../../shared/config/env.js';
import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import { identitySchema, outputSchema, timestampSchema, type OutputFormat } from '../../shared/schema/common.js';
import { parseInput } from './commands/common.js';

export type GlobalOptions = {
  output?: string;
  home?: string;
  as?: string;
  now?: string;
  describe?: boolean;
  debug?: boolean;
};

export type CommandContext = {
  output: OutputFormat;
  homeDir?: string;
  caller?: string;
  now?: number;
  debug: boolean;
  logLevel: RegistryEnv['NLR_LOG_LEVEL'];
};

/** Command-line flags win over the environment. */
export const resolveCommandContext = (options: GlobalOptions, env: RegistryEnv = readEnv()): CommandContext => {
  const caller = options.as ?? env.NLR_IDENTITY;

  return {
    output: parseInput(outputSchema, options.output ?? 'text', '--output'),
    homeDir: options.home ?? env.NLR_HOME,
    caller: caller === undefined ? undefined : parseInput(identitySchema, caller, '--as'),
    now: options.now === undefined ? undefined : parseInput(timestampSchema, options.now, '--now'),
    debug: options.debug ?? false,
    logLevel: env.NLR_LOG_LEVEL
  };
};

export const requireCaller = (ctx: CommandContext): string => {
  if (!ctx.caller) {
    throw new AppError('No caller identity given.', {
      code: ERROR_CODE.VALIDATION_ERROR,
      suggestions: ['Pass --as <identity> or set NLR_IDENTITY.']
    });
  }
  return ctx.caller;
};
