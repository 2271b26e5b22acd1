import { readFile } from 'node:fs/promises';
import { AppError, NotFoundError } from '../../utils/errors.js';
import type { CredentialStore } from './types.js';

/**
 * Resolves `env:NAME` and `file:/path/to/secret` references. The secret
 * itself is never included in an error.
 */
export class SecretRefCredentialStore implements CredentialStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(ref: string): Promise<string> {
    const separator = ref.indexOf(':');
    const scheme = separator > 0 ? ref.slice(0, separator) : '';
    const target = ref.slice(separator + 1);

    if (scheme === 'env') {
      const value = this.env[target];
      if (!value) throw new NotFoundError('Credential env var', target);
      return value.trim();
    }

    if (scheme === 'file') {
      try {
        const value = (await readFile(target, 'utf8')).trim();
        if (!value) throw new NotFoundError('Credential file', target);
        return value;
      } catch (error) {
        if (error instanceof AppError) throw error;
        throw new AppError(`Could not read credential file '${target}'`, {
          code: 'CREDENTIAL_UNAVAILABLE',
          context: { target },
          cause: error,
        });
      }
    }

    throw new AppError(`Unsupported credential reference scheme '${scheme || '(none)'}'`, {
      code: 'CREDENTIAL_UNAVAILABLE',
      statusCode: 400,
    });
  }
}
