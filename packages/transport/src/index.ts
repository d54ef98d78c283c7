export { ServiceClient } from './ServiceClient';
export type { HttpMethod, IServiceClient, QueryValue, RequestOptions, ServiceClientOptions } from './ServiceClient';
export { ClientFactory } from './ClientFactory';
export type { IClientFactory } from './ClientFactory';
export { DEFAULT_ENDPOINT_TEMPLATE, loadProviderConfig } from './config';
export type { ProviderConfig } from './config';
export { CloudApiError, ConfigError, isNotFound, toCloudApiError } from './errors';
export { isThrottled, isTransientError, parseRetryAfter, RETRY_DEFAULTS, withRetry } from './retry';
export type { RetryOptions } from './retry';
