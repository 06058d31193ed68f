import {
  HttpClient,
  createApiKeyInterceptor,
  createConsoleLogger,
  createCredentialInterceptor,
  createErrorLoggingInterceptor,
  executeWithRetry,
  isNoOp,
  isRecord,
  type CredentialProvider,
  type ErrorClassifier,
  type HttpRequestInterceptor,
  type HttpTransport,
  type Logger,
  type NoOp,
  type RetryOptions,
  type RetryProfile,
} from '@discovery-engine/http-core';
import { PageIterator, createPageIterator } from '@discovery-engine/pagination';
import { createCallDescriptor, type CallDescriptor, type CallDescriptorInput } from './callDescriptor';
import type { InterfaceDocument } from './document';
import { DiscoveryDocumentLoader, type DocumentSource } from './DocumentLoader';
import { resolveMethod, type ResolvedMethod } from './methodTree';
import { bindArguments, type BindOptions, type BoundCall, type CallArgs } from './requestBuilder';
import { ServiceCache } from './ServiceCache';
import { uploadMedia, type MediaBody, type UploadOptions, type UploadResult } from './upload';

export interface CallBuilderConfig {
  /** Client used for every call; built from the options below when omitted. */
  http?: HttpClient;
  transport?: HttpTransport;
  credentials?: CredentialProvider;
  /** Default API key for calls that do not carry their own. */
  apiKey?: string;
  timeoutMs?: number;
  retry?: RetryProfile;
  classifier?: ErrorClassifier;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  cache?: ServiceCache;
  loader?: DiscoveryDocumentLoader;
  urlTemplates?: string[];
}

export interface ResolveOptions {
  auth?: string;
  key?: string;
  labels?: string;
  documentPath?: string;
}

export interface RunOptions {
  iterate?: boolean;
  limit?: number;
  resultKey?: string;
}

export interface ExecuteOptions {
  /** With `false`, stop after binding and return the {@link BoundCall}. */
  run?: boolean;
}

export type CallResult = unknown;

const CREATION_METHODS = new Set(['create', 'insert']);

/**
 * Builds and runs calls against any service described by an interface
 * document.
 *
 * ```typescript
 * const calls = new CallBuilder({ credentials });
 * const widgets = await calls.iterate({
 *   service: 'widgets',
 *   version: 'v1',
 *   method: 'projects.widgets.list',
 *   args: { parent: 'projects/p-1' },
 * });
 * ```
 *
 * Retries happen only inside {@link executeWithRetry}; the builder never loops
 * on its own.
 */
export class CallBuilder {
  private readonly http: HttpClient;
  private readonly loader: DiscoveryDocumentLoader;
  private readonly cache: ServiceCache;
  private readonly logger: Logger;
  private readonly credentials?: CredentialProvider;

  constructor(private readonly config: CallBuilderConfig = {}) {
    this.logger = config.logger ?? createConsoleLogger('discovery');
    this.credentials = config.credentials;
    this.http = config.http ?? this.createHttpClient();
    this.cache = config.cache ?? new ServiceCache();
    this.loader =
      config.loader ??
      new DiscoveryDocumentLoader({
        http: this.http,
        urlTemplates: config.urlTemplates,
        retry: config.retry,
        classifier: config.classifier,
        sleep: config.sleep,
        logger: this.logger,
      });
  }

  /**
   * Loads (or reuses) the interface document of a service.
   */
  document(source: DocumentSource): Promise<InterfaceDocument> {
    const fingerprint = source.auth ? this.credentials?.fingerprint?.(source.auth) : undefined;
    return this.cache.getOrLoad(
      {
        service: source.service,
        version: source.version,
        auth: source.auth,
        credentialFingerprint: fingerprint,
        key: source.key,
        labels: source.labels,
        documentPath: source.documentPath,
      },
      () => this.loader.load(source),
    );
  }

  async resolve(service: string, version: string, dotPath: string, options: ResolveOptions = {}): Promise<ResolvedMethod> {
    const document = await this.document({ service, version, ...options });
    return resolveMethod(document, dotPath);
  }

  bind(resolved: ResolvedMethod, args: CallArgs, options: BindOptions = {}): BoundCall {
    return bindArguments(resolved, args, { timeoutMs: this.config.timeoutMs, ...options });
  }

  run(bound: BoundCall, options: RunOptions & { iterate: true }): Promise<PageIterator<unknown> | NoOp>;
  run(bound: BoundCall, options?: RunOptions): Promise<CallResult>;
  async run(bound: BoundCall, options: RunOptions = {}): Promise<CallResult> {
    const operation = bound.request.operation;
    const creation = isCreation(bound.resolved);
    this.logger.debug('discovery.call', { operation, auth: bound.options.auth, creation });

    const response = await executeWithRetry(() => this.http.requestJson<unknown>(bound.request), {
      ...this.retryOptions(operation),
      creation,
    });
    if (isNoOp(response)) {
      return response;
    }

    if (options.iterate) {
      return createPageIterator({
        fetchPage: (args) => this.fetchPage(bound, args),
        args: bound.args,
        initialPage: response,
        limit: options.limit,
        logger: this.logger,
        operation,
      });
    }

    if (options.resultKey !== undefined) {
      return isRecord(response) && response[options.resultKey] !== undefined ? response[options.resultKey] : [];
    }
    return response;
  }

  /**
   * resolve → bind → run for a descriptor.
   */
  execute(input: CallDescriptorInput | CallDescriptor, options: { run: false }): Promise<BoundCall>;
  execute(input: CallDescriptorInput | CallDescriptor, options?: ExecuteOptions): Promise<CallResult>;
  async execute(input: CallDescriptorInput | CallDescriptor, options: ExecuteOptions = {}): Promise<CallResult> {
    const descriptor = createCallDescriptor(input);
    const bound = await this.prepare(descriptor);
    if (options.run === false) {
      return bound;
    }
    return this.run(bound, {
      iterate: descriptor.iterate,
      limit: descriptor.limit,
      resultKey: descriptor.resultKey,
    });
  }

  /**
   * Like {@link execute} with iteration forced on.
   */
  async iterate(input: CallDescriptorInput | CallDescriptor): Promise<PageIterator<unknown> | NoOp> {
    const descriptor = createCallDescriptor(input);
    const bound = await this.prepare(descriptor);
    return this.run(bound, { iterate: true, limit: descriptor.limit });
  }

  /**
   * Resumable media upload for methods that support it. The descriptor's
   * `args.body` travels as the object metadata.
   */
  async upload(
    input: CallDescriptorInput | CallDescriptor,
    media: MediaBody,
    options: Omit<UploadOptions, 'sleep' | 'logger'> = {},
  ): Promise<UploadResult> {
    const bound = await this.execute(input, { run: false });
    this.logger.debug('discovery.upload', { operation: bound.request.operation, bytes: media.data.byteLength });
    return uploadMedia(this.http, bound, media, { ...options, sleep: this.config.sleep, logger: this.logger });
  }

  private async prepare(descriptor: CallDescriptor): Promise<BoundCall> {
    const resolved = await this.resolve(descriptor.service, descriptor.version, descriptor.method, {
      auth: descriptor.auth,
      key: descriptor.key,
      labels: descriptor.labels,
      documentPath: descriptor.documentPath,
    });
    return this.bind(resolved, descriptor.args, {
      auth: descriptor.auth,
      key: descriptor.key,
      headers: descriptor.headers,
    });
  }

  private fetchPage(bound: BoundCall, args: CallArgs): Promise<unknown> {
    const next = this.bind(bound.resolved, args, bound.options);
    return executeWithRetry(() => this.http.requestJson<unknown>(next.request), this.retryOptions(next.request.operation));
  }

  private retryOptions(operation?: string): RetryOptions & { creation?: false } {
    return {
      ...this.config.retry,
      classifier: this.config.classifier,
      sleep: this.config.sleep,
      logger: this.logger,
      operation,
    };
  }

  private createHttpClient(): HttpClient {
    const interceptors: HttpRequestInterceptor[] = [];
    if (this.config.credentials) {
      interceptors.push(createCredentialInterceptor({ provider: this.config.credentials }));
    }
    if (this.config.apiKey) {
      interceptors.push(createApiKeyInterceptor({ apiKey: this.config.apiKey }));
    }
    interceptors.push(createErrorLoggingInterceptor(this.logger));

    return new HttpClient({
      clientName: 'discovery',
      transport: this.config.transport,
      timeoutMs: this.config.timeoutMs,
      interceptors,
      logger: this.logger,
    });
  }
}

/** `create`/`insert` methods treat "already exists" as done. */
export function isCreation(resolved: ResolvedMethod): boolean {
  if (CREATION_METHODS.has(resolved.name)) return true;
  const id = resolved.method.id ?? '';
  const last = id.slice(id.lastIndexOf('.') + 1);
  return CREATION_METHODS.has(last);
}
