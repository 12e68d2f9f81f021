import { z } from 'zod';

import { AppError } from '../errors/AppError.js';
import { ERROR_CODE } from '../errors/ErrorCode.js';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());

const envSchema = z.object({
  NLR_HOME: optionalText,
  NLR_IDENTITY: optionalText,
  NLR_LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn')
  )
});

export type RegistryEnv = z.infer<typeof envSchema>;

export const readEnv = (source: NodeJS.ProcessEnv = process.env): RegistryEnv => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new AppError('Invalid environment configuration.', {
      code: ERROR_CODE.VALIDATION_ERROR,
      details: { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
      suggestions: ['Check NLR_HOME, NLR_IDENTITY and NLR_LOG_LEVEL.']
    });
  }
  return parsed.data;
};
