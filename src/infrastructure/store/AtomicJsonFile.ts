import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

export class AtomicJsonFile {
  /** Parsed JSON content, or null when the file does not exist. Malformed JSON throws. */
  public static async read(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(content);
    return parsed;
  }

  public static async exists(filePath: string): Promise<boolean> {
    return (await AtomicJsonFile.read(filePath)) !== null;
  }

  public static async write(filePath: string, data: unknown): Promise<void> {
    const dir = path.dirname(filePath);
    await mkdir(dir, { recursive: true });

    const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
    const serialized = `${JSON.stringify(data, null, 2)}\n`;

    try {
      await writeFile(tempPath, serialized, 'utf8');
      await rename(tempPath, filePath);
    } finally {
      await rm(tempPath, { force: true });
    }
  }
}
