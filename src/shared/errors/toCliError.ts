import { AppError, isAppError } from './AppError.js';
import { ERROR_CODE } from './ErrorCode.js';

export type CliError = {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestions: string[];
};

const INTERNAL_SUGGESTIONS = ['Retry once. If it still fails, run with --debug for diagnostics.'];

const FILESYSTEM_SUGGESTIONS = [
  'Check that the registry home (--home or NLR_HOME) exists and is writable by this user.',
  ...INTERNAL_SUGGESTIONS
];

type SystemErrorFields = {
  errno: string;
  path?: string;
};

const systemErrorFields = (error: unknown): SystemErrorFields | null => {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
    return null;
  }
  const filePath = 'path' in error && typeof error.path === 'string' ? error.path : undefined;
  return filePath === undefined ? { errno: error.code } : { errno: error.code, path: filePath };
};

export const toCliError = (error: unknown): CliError => {
  if (isAppError(error)) {
    return {
      code: error.code,
      message: error.message,
      details: error.details,
      suggestions: error.suggestions
    };
  }

  // Errors from fs calls against the registry home carry an errno code and usually a path.
  const system = systemErrorFields(error);
  const wrapped = new AppError(system ? 'Registry home could not be accessed.' : 'Unexpected internal failure.', {
    code: ERROR_CODE.INTERNAL_ERROR,
    details: {
      originalError: error instanceof Error ? error.message : String(error),
      ...system
    },
    suggestions: system ? FILESYSTEM_SUGGESTIONS : INTERNAL_SUGGESTIONS
  });

  return {
    code: wrapped.code,
    message: wrapped.message,
    details: wrapped.details,
    suggestions: wrapped.suggestions
  };
};
