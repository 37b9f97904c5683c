import { MissingCredentialError } from './errors';
import { SupportedPlatform } from './types';

export const CREDENTIAL_KEYS = [
  'LINKEDIN_EMAIL',
  'LINKEDIN_PASSWORD',
  'X_USERNAME',
  'X_PASSWORD',
  'FACEBOOK_EMAIL',
  'FACEBOOK_PASSWORD',
  'MEDIUM_SESSION_TOKEN',
  'META_ACCESS_TOKEN',
  'FACEBOOK_PAGE_ID',
  'FACEBOOK_PAGE_TOKEN',
  'INSTAGRAM_ACCOUNT_ID',
] as const;

export type CredentialKey = (typeof CREDENTIAL_KEYS)[number];

export interface LoginPair {
  login: string;
  secret: string;
}

/**
 * Read-only view over named secrets. Built once at startup and handed to
 * adapter constructors; adapters never read the environment themselves.
 */
export class CredentialSet {
  private readonly values: ReadonlyMap<CredentialKey, string>;

  constructor(source: Partial<Record<CredentialKey, string>>) {
    const values = new Map<CredentialKey, string>();
    for (const key of CREDENTIAL_KEYS) {
      const value = source[key]?.trim();
      if (value) values.set(key, value);
    }
    this.values = values;
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): CredentialSet {
    const source: Partial<Record<CredentialKey, string>> = {};
    for (const key of CREDENTIAL_KEYS) source[key] = env[key];
    return new CredentialSet(source);
  }

  has(key: CredentialKey): boolean {
    return this.values.has(key);
  }

  get(key: CredentialKey): string | undefined {
    return this.values.get(key);
  }

  require(key: CredentialKey, platform?: SupportedPlatform): string {
    const value = this.values.get(key);
    if (!value) throw new MissingCredentialError(key, { platform });
    return value;
  }

  /** Both halves of a login pair, or undefined when either is absent. */
  loginPair(loginKey: CredentialKey, secretKey: CredentialKey): LoginPair | undefined {
    const login = this.values.get(loginKey);
    const secret = this.values.get(secretKey);
    return login && secret ? { login, secret } : undefined;
  }

  /** Names of configured keys, never their values. */
  configuredKeys(): CredentialKey[] {
    return [...this.values.keys()];
  }
}
