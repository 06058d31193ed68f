import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { RawHttpResponse } from '@discovery-engine/http-core';
import { parseInterfaceDocument, type InterfaceDocument } from '../document';

export const widgetsDocumentPath = fileURLToPath(new URL('./fixtures/widgets.discovery.json', import.meta.url));

export const widgetsDocumentText = readFileSync(widgetsDocumentPath, 'utf8');

export function loadWidgetsDocument(): InterfaceDocument {
  return parseInterfaceDocument(JSON.parse(widgetsDocumentText));
}

export const json = (body: unknown, status = 200): RawHttpResponse => ({
  status,
  headers: { 'content-type': 'application/json' },
  body: JSON.stringify(body),
});
