import { z } from 'zod';

export const outputSchema = z.enum(['json', 'text']);

const digitsSchema = z.string().trim().regex(/^\d+$/, 'must be a non-negative whole number');

export const domainNameSchema = z.string().min(1, 'domain name cannot be empty');

export const identitySchema = z.string().trim().min(1, 'identity cannot be empty');

export const amountSchema = digitsSchema.transform((value) => BigInt(value));

export const yearsSchema = digitsSchema.transform((value) => Number(value));

export const timestampSchema = digitsSchema
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value), 'timestamp is out of range');

export const limitSchema = digitsSchema
  .transform((value) => Number(value))
  .refine((value) => value > 0, 'must be at least 1');

export type OutputFormat = z.infer<typeof outputSchema>;
