import { ConfigError } from './errors';

export interface ProviderConfig {
  region: string;
  projectId: string;
  authToken: string;
  /** URL template with `{service}` and `{region}` placeholders */
  endpointTemplate: string;
  /** Per-request timeout in milliseconds */
  requestTimeout: number;
  maxRetries: number;
}

export const DEFAULT_ENDPOINT_TEMPLATE = 'https://{service}.{region}.myhuaweicloud.com/';

const ENV_KEYS = {
  region: 'SKYFORM_REGION',
  projectId: 'SKYFORM_PROJECT_ID',
  authToken: 'SKYFORM_AUTH_TOKEN',
  endpointTemplate: 'SKYFORM_ENDPOINT',
  requestTimeout: 'SKYFORM_REQUEST_TIMEOUT',
  maxRetries: 'SKYFORM_MAX_RETRIES',
} as const;

function parseNumber(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  return value;
}

/**
 * Resolves provider settings from explicit overrides first, then the environment.
 */
export function loadProviderConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<ProviderConfig> = {}): ProviderConfig {
  const region = overrides.region ?? env[ENV_KEYS.region];
  const projectId = overrides.projectId ?? env[ENV_KEYS.projectId];
  const authToken = overrides.authToken ?? env[ENV_KEYS.authToken];

  const missing = [
    [ENV_KEYS.region, region],
    [ENV_KEYS.projectId, projectId],
    [ENV_KEYS.authToken, authToken],
  ]
    .filter(([, value]) => !value)
    .map(([key]) => key);
  if (missing.length > 0 || !region || !projectId || !authToken) throw new ConfigError(`Missing provider configuration: ${missing.join(', ')}`);

  const endpointTemplate = overrides.endpointTemplate ?? env[ENV_KEYS.endpointTemplate] ?? DEFAULT_ENDPOINT_TEMPLATE;
  if (!endpointTemplate.includes('{service}')) throw new ConfigError(`${ENV_KEYS.endpointTemplate} must contain a {service} placeholder`);

  return {
    region,
    projectId,
    authToken,
    endpointTemplate,
    requestTimeout: overrides.requestTimeout ?? parseNumber(ENV_KEYS.requestTimeout, env[ENV_KEYS.requestTimeout], 30_000),
    maxRetries: overrides.maxRetries ?? parseNumber(ENV_KEYS.maxRetries, env[ENV_KEYS.maxRetries], 3),
  };
}
