import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import { toCliError } from '../../shared/errors/toCliError.js';
import type { ResponseEnvelope } from '../../shared/schema/envelopes.js';

export const mapExitCode = (errorCode: string): number => {
  switch (errorCode) {
    case ERROR_CODE.VALIDATION_ERROR:
    case ERROR_CODE.INVALID_DURATION:
      return 2;
    case ERROR_CODE.DOMAIN_STILL_ACTIVE:
    case ERROR_CODE.NOT_OWNER:
      return 3;
    case ERROR_CODE.INSUFFICIENT_PAYMENT:
      return 4;
    case ERROR_CODE.REGISTRY_LOCK_TIMEOUT:
      return 5;
    case ERROR_CODE.UNAUTHORIZED:
      return 6;
    case ERROR_CODE.CONTRACT_PAUSED:
      return 7;
    case ERROR_CODE.REGISTRY_NOT_INITIALIZED:
    case ERROR_CODE.REGISTRY_ALREADY_INITIALIZED:
    case ERROR_CODE.STATE_CORRUPTED:
      return 8;
    case ERROR_CODE.INTERNAL_ERROR:
    default:
      return 11;
  }
};

export const toFailureEnvelope = (id = 'local-error', error: unknown): ResponseEnvelope => {
  const cliError = toCliError(error);

  return {
    id,
    ok: false,
    error: {
      code: cliError.code,
      message: cliError.message,
      details: cliError.details,
      suggestions: cliError.suggestions
    },
    meta: {
      durationMs: 0
    }
  };
};
