export { Dispatcher, type DispatchOptions, type DispatchScope, type DispatcherOptions } from './dispatcher/dispatcher.js';
export { HttpVerbs, prepareRequest } from './dispatcher/http-verbs.js';
export { NetworkSession, ScopedHttp, type CallBody, type SessionOptions } from './dispatcher/network-session.js';
export { DEFAULT_NETWORK_NAME, NetworkRegistry, type NetworkSummary, type RegistryDependencies } from './network/registry.js';
export { Network, type ContextOptions, type NetworkDependencies } from './network/network.js';
export {
  NETWORK_DEFAULTS,
  decodeNetworkSettings,
  type NetworkSettings,
  type RawNetworkSettings,
} from './network/settings.js';
export {
  loadSettingsFile,
  parseSettings,
  parseSettingsYaml,
  settingsSchema,
  type EngineSettings,
  type OutgoingSettings,
  type Settings,
  type SettingsInput,
} from './config/settings.js';
export {
  DEFAULT_CONTEXT_TIMEOUT_MS,
  RequestContext,
  TIMEOUT_ALLOWANCE_MS,
  type ClientProvider,
} from './context/request-context.js';
export {
  RetryNewClient,
  RetrySameClient,
  RetryStrategy,
  RetryWithinFunction,
  createRetryStrategy,
  type CallTools,
  type RetryStrategyKind,
  type SoftRetry,
} from './retry/retry-strategy.js';
export { shouldRetryStatus, type RetryOnHttpError } from './retry/retry-on-http-error.js';
export { AxiosHttpClient } from './client/axios-http-client.js';
export { UndiciHttpClient } from './client/undici-http-client.js';
export { createHttpClient } from './client/create-http-client.js';
export { HttpClient, type HttpClientFactory, type HttpClientOptions, type SendOptions } from './client/http-client.js';
export { NetworkResponse, StreamResponse, isErrorStatus, type ResponseHead } from './client/response.js';
export { TorVerifier } from './client/tor-verifier.js';
export { raiseForHttpError, raiseForStreamHttpError } from './http-errors/raise-for-http-error.js';
export { detectChallenge, type Challenge } from './http-errors/challenge-detector.js';
export { NetworkMetrics, type NetworkMetricSnapshot, type RequestOutcome } from './observability/metrics.js';
export {
  AccessDeniedError,
  CaptchaError,
  ConfigurationError,
  HttpStatusError,
  NetworkError,
  ProtocolDisabledError,
  RemoteDisconnectedError,
  RequestTimeoutError,
  RetryStateError,
  SoftRetryError,
  TooManyRequestsError,
  TransportError,
  TransportTimeoutError,
} from './errors.js';
export type { HttpMethod, RequestDescriptor, RequestOptions } from './types.js';
