export * from './types';
export { HttpClient } from './HttpClient';
export {
  HttpError,
  TimeoutError,
  TlsError,
  TransportError,
  isRecord,
  parseRemoteErrorBody,
  type RemoteErrorBody,
} from './errors';
export * from './errorClassifier';
export * from './retry';
export * from './logger';
export * from './interceptors';
export * from './credentials';
export * from './transport/fetchTransport';
