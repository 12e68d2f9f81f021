import type { OutputFormat } from '../../shared/schema/common.js';
import type { ResponseEnvelope } from '../../shared/schema/envelopes.js';

export type RenderableResponse = ResponseEnvelope & {
  text?: string;
};

const formatScalar = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '-';
  }
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
};

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Registry views are shallow: a record or config nested one level, or a list of events.
const renderFields = (data: Record<string, unknown>, indent = ''): string[] =>
  Object.entries(data).flatMap(([key, value]) => {
    if (isPlainRecord(value)) {
      return [`${indent}${key}:`, ...renderFields(value, `${indent}  `)];
    }
    if (Array.isArray(value)) {
      return value.length === 0
        ? [`${indent}${key}: (none)`]
        : [`${indent}${key}:`, ...value.map((item) => `${indent}  - ${formatScalar(item)}`)];
    }
    return [`${indent}${key}: ${formatScalar(value)}`];
  });

const renderText = (payload: RenderableResponse): string => {
  if (payload.ok) {
    if (typeof payload.text === 'string' && payload.text.trim().length > 0) {
      return payload.text;
    }
    const lines = renderFields(payload.data ?? {});
    return lines.length > 0 ? lines.join('\n') : 'ok';
  }

  const headline = `error(${payload.error?.code ?? 'UNKNOWN'}): ${payload.error?.message ?? 'unknown error'}`;
  const hints = (payload.error?.suggestions ?? []).map((suggestion) => `  hint: ${suggestion}`);
  return [headline, ...hints].join('\n');
};

export const writeResponse = (payload: RenderableResponse, format: OutputFormat): void => {
  if (format === 'text') {
    process.stdout.write(`${renderText(payload)}\n`);
    return;
  }

  const { text: _text, ...jsonPayload } = payload;
  process.stdout.write(`${JSON.stringify(jsonPayload)}\n`);
};

export const writeDiagnostic = (message: string): void => {
  process.stderr.write(`${message}\n`);
};
