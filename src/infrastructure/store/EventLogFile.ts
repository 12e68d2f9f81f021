import { appendFile, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { REGISTRY_EVENT_TYPES, type RegistryEvent } from '../../application/registry/events.js';
import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';

/** Event as written to the log: amounts become decimal strings. */
export type LoggedEvent = {
  recordedAt: string;
  type: RegistryEvent['type'];
  data: Record<string, string | number>;
};

const loggedEventSchema = z.object({
  recordedAt: z.string().min(1),
  type: z.enum(REGISTRY_EVENT_TYPES),
  data: z.record(z.string(), z.union([z.string(), z.number()]))
});

export const toLoggedEvent = (event: RegistryEvent, recordedAt: Date): LoggedEvent => {
  const data: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === 'type') {
      continue;
    }
    data[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return { recordedAt: recordedAt.toISOString(), type: event.type, data };
};

/** Append-only JSONL log of committed notifications. */
export class EventLogFile {
  public constructor(private readonly filePath: string) {}

  public async append(events: RegistryEvent[], recordedAt = new Date()): Promise<void> {
    if (events.length === 0) {
      return;
    }

    await mkdir(path.dirname(this.filePath), { recursive: true });
    const lines = events.map((event) => `${JSON.stringify(toLoggedEvent(event, recordedAt))}\n`).join('');
    await appendFile(this.filePath, lines, 'utf8');
  }

  /** Most recent `limit` entries, oldest first. */
  public async tail(limit: number): Promise<LoggedEvent[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const lines = content.split('\n').filter((line) => line.trim().length > 0);
    return lines.slice(-limit).map((line, index) => {
      const parsed = loggedEventSchema.safeParse(safeJsonParse(line));
      if (!parsed.success) {
        throw new AppError('Event log contains a malformed entry.', {
          code: ERROR_CODE.STATE_CORRUPTED,
          details: { filePath: this.filePath, line: lines.length - Math.min(limit, lines.length) + index + 1 }
        });
      }
      return parsed.data;
    });
  }
}

const safeJsonParse = (line: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(line);
    return parsed;
  } catch {
    return null;
  }
};
