import { z } from 'zod';

export const responseEnvelopeSchema = z.object({
  id: z.string().min(1),
  ok: z.boolean(),
  data: z.record(z.string(), z.unknown()).optional(),
  error: z
    .object({
      code: z.string().min(1),
      message: z.string().min(1),
      details: z.record(z.string(), z.unknown()).optional(),
      suggestions: z.array(z.string()).default([])
    })
    .optional(),
  meta: z
    .object({
      durationMs: z.number().nonnegative()
    })
    .optional()
});

export type ResponseEnvelope = z.infer<typeof responseEnvelopeSchema>;
