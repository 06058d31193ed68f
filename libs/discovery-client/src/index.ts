export * from './document';
export * from './errors';
export { findMethod, listMethods, resolveMethod, type ResolvedMethod } from './methodTree';
export { ServiceCache, type ServiceCacheKey } from './ServiceCache';
export {
  DEFAULT_DIRECTORY_URL,
  DEFAULT_DISCOVERY_URL_TEMPLATES,
  DiscoveryDocumentLoader,
  expandTemplate,
  type DocumentLoaderConfig,
  type DocumentSource,
} from './DocumentLoader';
export { sanitizeBody, sanitizeValue } from './sanitize';
export { bindArguments, expandPath, type BindOptions, type BoundCall, type CallArgs } from './requestBuilder';
export {
  CallDescriptorSchema,
  createCallDescriptor,
  type CallDescriptor,
  type CallDescriptorInput,
} from './callDescriptor';
export {
  CallBuilder,
  isCreation,
  type CallBuilderConfig,
  type CallResult,
  type ExecuteOptions,
  type ResolveOptions,
  type RunOptions,
} from './CallBuilder';
export {
  DEFAULT_UPLOAD_BASE_WAIT_MS,
  DEFAULT_UPLOAD_CHUNK_SIZE,
  DEFAULT_UPLOAD_MAX_ATTEMPTS,
  UPLOAD_RETRYABLE_STATUSES,
  uploadMedia,
  type MediaBody,
  type UploadOptions,
  type UploadResult,
} from './upload';
export * from './config';
