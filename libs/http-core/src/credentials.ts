import { createHash } from 'crypto';
import type { CredentialHandle, CredentialProvider, HttpHeaders } from './types';

export type TokenSource = () => Promise<string> | string;

/**
 * Credential handle that sets an `Authorization: Bearer` header from a token
 * source. The source is asked on every call, so it can refresh.
 */
export class BearerCredential implements CredentialHandle {
  constructor(private readonly getToken: TokenSource) {}

  async authorize(headers: HttpHeaders): Promise<HttpHeaders> {
    const token = await this.getToken();
    return { ...headers, Authorization: `Bearer ${token}` };
  }
}

/**
 * Provider backed by a fixed map of auth context → token source, e.g.
 * `{ user: () => refreshUserToken(), service: () => serviceToken }`.
 */
export function createStaticCredentialProvider(sources: Record<string, TokenSource | string>): CredentialProvider {
  const handles = new Map<string, CredentialHandle>();
  const fingerprints = new Map<string, string>();
  for (const [auth, source] of Object.entries(sources)) {
    handles.set(auth, new BearerCredential(typeof source === 'string' ? () => source : source));
    // fixed tokens are fingerprinted by value, refreshing sources by name
    fingerprints.set(auth, fingerprintOf(typeof source === 'string' ? source : auth));
  }

  return {
    getCredential(auth: string): CredentialHandle {
      const handle = handles.get(auth);
      if (!handle) {
        throw new Error(`No credential configured for auth context "${auth}"`);
      }
      return handle;
    },
    fingerprint(auth: string): string {
      return fingerprints.get(auth) ?? '';
    },
  };
}

export function fingerprintOf(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}
