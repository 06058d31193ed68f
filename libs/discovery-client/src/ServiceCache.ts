import { threadId } from 'worker_threads';
import type { InterfaceDocument } from './document';

export interface ServiceCacheKey {
  service: string;
  version: string;
  auth?: string;
  /** Fingerprint of the credential behind `auth`. */
  credentialFingerprint?: string;
  key?: string;
  labels?: string;
  documentPath?: string;
}

/**
 * Loaded interface documents, one per service/version/credential combination.
 *
 * Entries hold the load promise, so concurrent resolves of the same service
 * share one fetch. A load that fails is dropped and the next resolve tries
 * again. The owner decides the lifetime; call `clear()` on teardown.
 */
export class ServiceCache {
  private readonly entries = new Map<string, Promise<InterfaceDocument>>();

  static keyOf(key: ServiceCacheKey): string {
    return JSON.stringify([
      key.service,
      key.version,
      key.auth ?? '',
      threadId,
      key.credentialFingerprint ?? '',
      key.key ?? '',
      key.labels ?? '',
      key.documentPath ?? '',
    ]);
  }

  getOrLoad(key: ServiceCacheKey, load: () => Promise<InterfaceDocument>): Promise<InterfaceDocument> {
    const cacheKey = ServiceCache.keyOf(key);
    const existing = this.entries.get(cacheKey);
    if (existing) {
      return existing;
    }

    const pending: Promise<InterfaceDocument> = load().catch((error: unknown) => {
      if (this.entries.get(cacheKey) === pending) {
        this.entries.delete(cacheKey);
      }
      throw error;
    });
    this.entries.set(cacheKey, pending);
    return pending;
  }

  has(key: ServiceCacheKey): boolean {
    return this.entries.has(ServiceCache.keyOf(key));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
