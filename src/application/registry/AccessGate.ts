import { AppError } from '../../shared/errors/AppError.js';
import { ERROR_CODE } from '../../shared/errors/ErrorCode.js';
import type { Identity, RegistryConfig } from './types.js';

export class AccessGate {
  public constructor(private readonly config: Readonly<RegistryConfig>) {}

  /** Guards claim and renew. Admin operations never pass through here. */
  public assertNotPaused(): void {
    if (this.config.paused) {
      throw new AppError('Registry is paused.', {
        code: ERROR_CODE.CONTRACT_PAUSED,
        suggestions: ['Wait for the administrator to unpause the registry.']
      });
    }
  }

  public assertAdmin(caller: Identity): void {
    if (caller !== this.config.adminIdentity) {
      throw new AppError('Only the registry administrator may perform this operation.', {
        code: ERROR_CODE.UNAUTHORIZED,
        details: { caller },
        suggestions: ['Run the command as the administrator identity (--as <identity>).']
      });
    }
  }
}
