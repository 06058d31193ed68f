import { readFile } from 'fs/promises';
import {
  HttpClient,
  HttpError,
  executeWithRetry,
  noopLogger,
  type ErrorClassifier,
  type Logger,
  type QueryParams,
  type RetryProfile,
} from '@discovery-engine/http-core';
import { ZodError } from 'zod';
import { DirectoryListSchema, parseInterfaceDocument, type InterfaceDocument } from './document';
import { DocumentLoadError } from './errors';

export const DEFAULT_DISCOVERY_URL_TEMPLATES = [
  'https://{service}.googleapis.com/$discovery/rest?version={version}',
  'https://www.googleapis.com/discovery/v1/apis/{service}/{version}/rest',
];

export const DEFAULT_DIRECTORY_URL = 'https://www.googleapis.com/discovery/v1/apis';

export interface DocumentSource {
  service: string;
  version: string;
  auth?: string;
  /** API key, sent as `key` on the discovery request. */
  key?: string;
  /** Label selector for documents that expose preview surfaces. */
  labels?: string;
  /** Inline JSON document text, or a path to a JSON document on disk. */
  documentPath?: string;
  /** Already parsed document. */
  document?: unknown;
}

export interface DocumentLoaderConfig {
  http: HttpClient;
  /** Tried in order; a 404 moves on to the next template. */
  urlTemplates?: string[];
  directoryUrl?: string;
  retry?: RetryProfile;
  classifier?: ErrorClassifier;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  readFile?: (path: string) => Promise<string>;
}

export class DiscoveryDocumentLoader {
  private readonly http: HttpClient;
  private readonly urlTemplates: string[];
  private readonly directoryUrl: string;
  private readonly logger: Logger;
  private readonly readText: (path: string) => Promise<string>;

  constructor(private readonly config: DocumentLoaderConfig) {
    this.http = config.http;
    this.urlTemplates = config.urlTemplates ?? DEFAULT_DISCOVERY_URL_TEMPLATES;
    this.directoryUrl = config.directoryUrl ?? DEFAULT_DIRECTORY_URL;
    this.logger = config.logger ?? noopLogger;
    this.readText = config.readFile ?? ((path) => readFile(path, 'utf8'));
  }

  async load(source: DocumentSource): Promise<InterfaceDocument> {
    if (source.document !== undefined) {
      return this.validate(source, source.document);
    }
    if (source.documentPath) {
      return this.validate(source, await this.readLocal(source));
    }
    return this.fetchRemote(source);
  }

  /**
   * Asks the directory endpoint which version of `service` is preferred.
   */
  async preferredVersion(service: string, auth?: string): Promise<string> {
    const body = await executeWithRetry(
      () =>
        this.http.requestJson<unknown>({
          method: 'GET',
          url: this.directoryUrl,
          query: { name: service, preferred: true },
          operation: 'discovery.directory',
          auth,
        }),
      this.retryOptions('discovery.directory'),
    );

    const listing = DirectoryListSchema.parse(body);
    const preferred = listing.items.find((item) => item.name === service && item.preferred !== false);
    if (!preferred) {
      throw new DocumentLoadError(service, 'preferred', 'the directory lists no preferred version');
    }
    return preferred.version;
  }

  private async readLocal(source: DocumentSource): Promise<unknown> {
    const documentPath = (source.documentPath ?? '').trim();
    const text = documentPath.startsWith('{') ? documentPath : await this.readText(documentPath);
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new DocumentLoadError(source.service, source.version, 'local document is not valid JSON', {
        cause: error,
      });
    }
  }

  private async fetchRemote(source: DocumentSource): Promise<InterfaceDocument> {
    const { service, version } = source;
    const query: QueryParams = { key: source.key, labels: source.labels };

    for (const template of this.urlTemplates) {
      const url = expandTemplate(template, service, version);
      this.logger.debug('discovery.document.load', { service, version, url });
      try {
        const body = await executeWithRetry(
          () =>
            this.http.requestJson<unknown>({
              method: 'GET',
              url,
              query,
              operation: 'discovery.document',
              auth: source.auth,
            }),
          this.retryOptions(`discovery.document ${service} ${version}`),
        );
        return this.validate(source, body);
      } catch (error) {
        if (error instanceof HttpError && error.status === 404) {
          this.logger.debug('discovery.document.not_found', { service, version, url });
          continue;
        }
        if (error instanceof DocumentLoadError) {
          throw error;
        }
        throw new DocumentLoadError(service, version, error instanceof Error ? error.message : String(error), {
          cause: error,
        });
      }
    }

    throw new DocumentLoadError(service, version, `not found at any of ${this.urlTemplates.length} discovery URLs`);
  }

  private validate(source: DocumentSource, value: unknown): InterfaceDocument {
    try {
      const document = parseInterfaceDocument(value);
      this.logger.info('discovery.document.loaded', {
        service: source.service,
        version: source.version,
        schemas: Object.keys(document.schemas).length,
      });
      return document;
    } catch (error) {
      const detail =
        error instanceof ZodError
          ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
          : String(error);
      throw new DocumentLoadError(source.service, source.version, `invalid document (${detail})`, { cause: error });
    }
  }

  private retryOptions(operation: string) {
    return {
      ...this.config.retry,
      classifier: this.config.classifier,
      sleep: this.config.sleep,
      logger: this.logger,
      operation,
    };
  }
}

export function expandTemplate(template: string, service: string, version: string): string {
  return template
    .replace(/\{service\}/g, encodeURIComponent(service))
    .replace(/\{version\}/g, encodeURIComponent(version));
}
