import os from 'node:os';
import path from 'node:path';

export const resolveRegistryHome = (fromEnv = process.env.NLR_HOME): string => {
  if (fromEnv && fromEnv.trim().length > 0) {
    return fromEnv;
  }
  return path.join(os.homedir(), '.nlr');
};

export const resolveStatePath = (homeDir = resolveRegistryHome()): string => path.join(homeDir, 'state.json');

export const resolveLockPath = (homeDir = resolveRegistryHome()): string => path.join(homeDir, 'registry.lock');

export const resolveEventLogPath = (homeDir = resolveRegistryHome()): string => path.join(homeDir, 'events.jsonl');
