import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { vi } from 'vitest';
import type { Logger } from '@discovery-engine/http-core';
import { parseInterfaceDocument, type InterfaceDocument } from '@discovery-engine/discovery-client';

const catalogPath = fileURLToPath(new URL('./fixtures/catalog.discovery.json', import.meta.url));

export const catalogJson: unknown = JSON.parse(readFileSync(catalogPath, 'utf8'));

export function loadCatalogDocument(): InterfaceDocument {
  return parseInterfaceDocument(catalogJson);
}

export function createTestLogger() {
  return {
    debug: vi.fn<Parameters<Logger['debug']>, void>(),
    info: vi.fn<Parameters<Logger['info']>, void>(),
    warn: vi.fn<Parameters<Logger['warn']>, void>(),
    error: vi.fn<Parameters<Logger['error']>, void>(),
  } satisfies Logger;
}
