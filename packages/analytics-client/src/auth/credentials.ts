import { ConfigurationError } from '@factiva-analytics/contracts';
import { readString } from '@factiva-analytics/shared-infrastructure';

/**
 * Supplies the credential header for every API call. Keeping the credential
 * valid (for example refreshing an expired JWT) is the provider's job.
 */
export interface CredentialProvider {
  headers(): Record<string, string>;
  /** Input for the User-Agent checksum. Only its md5 digest is sent. */
  fingerprint(): string;
}

const USER_KEY_LENGTH = 32;

export function maskSecret(raw: string, visible = 4): string {
  if (raw.length <= visible) return '*'.repeat(raw.length);
  return raw.slice(-visible).padStart(raw.length, '*');
}

/**
 * Account user key issued by Dow Jones. Read from `FACTIVA_USERKEY` when not
 * passed explicitly.
 */
export class UserKey implements CredentialProvider {
  readonly key: string;

  constructor(key?: string) {
    const resolved = key ?? readString('FACTIVA_USERKEY');
    if (!resolved) {
      throw new ConfigurationError(
        'key parameter not provided and environment variable FACTIVA_USERKEY not set',
      );
    }
    if (resolved.length !== USER_KEY_LENGTH) {
      throw new ConfigurationError(`Factiva user key must be ${USER_KEY_LENGTH} characters long`);
    }
    this.key = resolved;
  }

  headers(): Record<string, string> {
    return { 'user-key': this.key };
  }

  fingerprint(): string {
    return this.key;
  }

  mask(): string {
    return maskSecret(this.key);
  }

  toString(): string {
    return `UserKey(${this.mask()})`;
  }
}

export class BearerToken implements CredentialProvider {
  private readonly token: string;

  constructor(token: string) {
    if (!token.trim()) {
      throw new ConfigurationError('A bearer token is required');
    }
    this.token = token;
  }

  headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.token}` };
  }

  fingerprint(): string {
    return 'bearer';
  }

  toString(): string {
    return `BearerToken(${maskSecret(this.token)})`;
  }
}
