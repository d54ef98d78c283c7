import type { ProviderConfig } from './config';
import type { IServiceClient } from './ServiceClient';
import { ServiceClient } from './ServiceClient';

/** Hosts that do not follow the `{service}.{region}` naming */
const SERVICE_HOSTS: Record<string, string> = {
  swr: 'swr-api',
};

export interface IClientFactory {
  /** Region used when a resource does not name one */
  readonly region: string;
  get(service: string, region?: string): IServiceClient;
}

/**
 * Builds one transport client per service and region, once per session.
 */
export class ClientFactory implements IClientFactory {
  private clients: Map<string, IServiceClient> = new Map();

  constructor(private readonly config: ProviderConfig) {}

  get region(): string {
    return this.config.region;
  }

  endpointFor(service: string, region: string): string {
    return this.config.endpointTemplate.replaceAll('{service}', SERVICE_HOSTS[service] ?? service).replaceAll('{region}', region);
  }

  get(service: string, region: string = this.config.region): IServiceClient {
    const key = `${service}/${region}`;
    let client = this.clients.get(key);
    if (!client) {
      client = new ServiceClient({
        endpoint: this.endpointFor(service, region),
        projectId: this.config.projectId,
        authToken: this.config.authToken,
        timeout: this.config.requestTimeout,
        retry: { maxAttempts: this.config.maxRetries + 1 },
      });
      this.clients.set(key, client);
    }

    return client;
  }
}
