import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const DEFAULT_VERSION = '0.1.0';

type PackageManifest = {
  version?: unknown;
};

// Works from both src/ (tsx, vitest) and dist/ since each sits two levels below the root.
const resolveCliVersion = (): string => {
  const thisFilePath = fileURLToPath(import.meta.url);
  const packagePath = path.join(path.resolve(path.dirname(thisFilePath), '../..'), 'package.json');

  let manifest: PackageManifest;
  try {
    manifest = JSON.parse(readFileSync(packagePath, 'utf8'));
  } catch {
    return DEFAULT_VERSION;
  }

  return typeof manifest.version === 'string' && manifest.version.trim().length > 0
    ? manifest.version
    : DEFAULT_VERSION;
};

export const CLI_VERSION = resolveCliVersion();
