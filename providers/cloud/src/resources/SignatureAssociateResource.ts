import type { IResourceHandler, ISchema, ResourceTimeouts } from '@skyform/contracts';
import { ResourceData } from '@skyform/contracts';
import { PollStatus, reconcileOrThrow, ReconcileTimeoutError } from '@skyform/reconciler';
import type { IClientFactory, IServiceClient } from '@skyform/transport';
import { isNotFound } from '@skyform/transport';
import debug from 'debug';
import { z } from 'zod';

import { parseImportId, parseInputs, parseResponse, uniqueSorted, wrapError } from '../common';

const debugSignature = debug('skyform:provider:signature-associate');

export const SIGNATURE_ASSOCIATE_TYPE = 'apig_signature_associate';

const BINDINGS_PATH = 'v2/{project_id}/apigw/instances/{instance_id}/sign-bindings';
const BOUND_APIS_PATH = 'v2/{project_id}/apigw/instances/{instance_id}/sign-bindings/binded-apis';
const BINDING_PATH = 'v2/{project_id}/apigw/instances/{instance_id}/sign-bindings/{bind_id}';

const PAGE_LIMIT = 500;

export const signatureAssociateSchema = z.object({
  region: z.string().min(1).optional(),
  instance_id: z.string().min(1),
  signature_id: z.string().min(1),
  publish_ids: z.array(z.string().min(1)).min(1).transform(uniqueSorted),
});

export type SignatureAssociateAttributes = z.output<typeof signatureAssociateSchema>;

const bindingSchema = z.object({
  id: z.string(),
  publish_id: z.string(),
  api_id: z.string().nullish(),
  api_name: z.string().nullish(),
  env_name: z.string().nullish(),
});

const bindingPageSchema = z.object({
  bindings: z.array(bindingSchema).nullish(),
  total: z.number().nullish(),
});

export type SignatureBinding = z.output<typeof bindingSchema>;

export interface SignatureAssociateOptions {
  /** Smallest spacing between polls while waiting for a bind or unbind to show up */
  pollInterval?: number;
}

/** What the list endpoint must show before a bind or unbind counts as done */
export function bindingCompleted(bindings: SignatureBinding[], publishIds: string[]): boolean {
  const bound = new Set(bindings.map((b) => b.publish_id));
  return publishIds.every((id) => bound.has(id));
}

export function unbindingCompleted(bindings: SignatureBinding[], bindId: string): boolean {
  return !bindings.some((b) => b.id === bindId);
}

/** A timeout leaves the remote operation undetermined; anything else is a hard failure */
function describeFailure(operation: string, message: string, error: unknown): Error {
  if (error instanceof ReconcileTimeoutError) return new Error(`timed out waiting for the ${operation} to complete, the operation may still be in progress`, { cause: error });
  return wrapError(message, error);
}

/**
 * Binds a signature key to published APIs on a dedicated gateway instance.
 * Bind and unbind are eventually consistent: each call is followed by polling the binding list.
 */
export class SignatureAssociateResource implements IResourceHandler<SignatureAssociateAttributes> {
  readonly timeouts: Partial<ResourceTimeouts> = { create: 3 * 60_000, update: 3 * 60_000, delete: 3 * 60_000 };
  private readonly pollInterval: number;

  constructor(
    private readonly clients: IClientFactory,
    options: SignatureAssociateOptions = {}
  ) {
    this.pollInterval = options.pollInterval ?? 2000;
  }

  async getSchema(): Promise<ISchema> {
    return {
      region: { type: 'string', optional: true, computed: true, forceNew: true, description: 'Region where the signature and the APIs are located' },
      instance_id: { type: 'string', required: true, forceNew: true, description: 'Dedicated instance the APIs and the signature belong to' },
      signature_id: { type: 'string', required: true, forceNew: true },
      publish_ids: { type: 'set', elemType: 'string', required: true, description: 'Publish IDs of the APIs bound by the signature' },
    };
  }

  async validate(inputs: Record<string, unknown>): Promise<SignatureAssociateAttributes> {
    return parseInputs(SIGNATURE_ASSOCIATE_TYPE, signatureAssociateSchema, inputs);
  }

  private client(data: ResourceData<SignatureAssociateAttributes>): IServiceClient {
    return this.clients.get('apig', data.get('region'));
  }

  /** Every API bound to the signature, across all pages */
  async listBindings(client: IServiceClient, instanceId: string, signatureId: string): Promise<SignatureBinding[]> {
    const path = client.buildPath(BOUND_APIS_PATH, { instance_id: instanceId });
    const bindings: Map<string, SignatureBinding> = new Map();

    for (let offset = 0; ; ) {
      const body = await client.request('GET', path, { query: { sign_id: signatureId, limit: PAGE_LIMIT, offset }, okCodes: [200] });
      const page = parseResponse('signature binding list', bindingPageSchema, body);
      const items = page.bindings ?? [];

      const known = bindings.size;
      for (const item of items) if (!bindings.has(item.id)) bindings.set(item.id, item);
      offset += items.length;

      // A page with no new bind IDs means the endpoint ignores the offset
      if (bindings.size === known) break;
      if (items.length < PAGE_LIMIT || (page.total != null && offset >= page.total)) break;
    }

    return [...bindings.values()];
  }

  private async bind(client: IServiceClient, data: ResourceData<SignatureAssociateAttributes>, publishIds: string[], timeout: number): Promise<void> {
    const instanceId = data.get('instance_id');
    const signatureId = data.get('signature_id');

    try {
      // An API that already has a signature of the same type gets it replaced
      await reconcileOrThrow({
        label: `bind signature ${signatureId}`,
        mutate: () => client.request('POST', client.buildPath(BINDINGS_PATH, { instance_id: instanceId }), { body: { sign_id: signatureId, publish_ids: publishIds }, okCodes: [201] }),
        poll: async () => {
          const bindings = await this.listBindings(client, instanceId, signatureId);
          return { status: bindingCompleted(bindings, publishIds) ? PollStatus.Completed : PollStatus.Pending, observed: bindings };
        },
        timeout,
        minPollInterval: this.pollInterval,
      });
    } catch (error) {
      throw describeFailure('binding', 'error binding signature to the APIs', error);
    }
  }

  private async unbind(client: IServiceClient, data: ResourceData<SignatureAssociateAttributes>, publishIds: string[], timeout: number): Promise<void> {
    const instanceId = data.get('instance_id');
    const signatureId = data.get('signature_id');

    let current: SignatureBinding[];
    try {
      current = await this.listBindings(client, instanceId, signatureId);
    } catch (error) {
      throw wrapError(`error getting binding APIs based on signature (${signatureId})`, error);
    }

    const removing = new Set(publishIds);
    const bindIds = current.filter((b) => removing.has(b.publish_id)).map((b) => b.id);

    for (const bindId of bindIds) {
      try {
        await reconcileOrThrow({
          label: `unbind ${bindId}`,
          mutate: () => client.request('DELETE', client.buildPath(BINDING_PATH, { instance_id: instanceId, bind_id: bindId }), { okCodes: [204] }),
          poll: async () => {
            const bindings = await this.listBindings(client, instanceId, signatureId);
            return { status: unbindingCompleted(bindings, bindId) ? PollStatus.Completed : PollStatus.Pending, observed: bindings };
          },
          timeout,
          minPollInterval: this.pollInterval,
        });
      } catch (error) {
        throw describeFailure('unbind operation', 'an error occurred during unbind signature', error);
      }
    }
  }

  async create(data: ResourceData<SignatureAssociateAttributes>): Promise<void> {
    const client = this.client(data);

    await this.bind(client, data, data.get('publish_ids'), data.timeout('create'));
    data.setId(`${data.get('instance_id')}/${data.get('signature_id')}`);
    debugSignature('bound signature %s to %d APIs', data.get('signature_id'), data.get('publish_ids').length);

    await this.read(data);
  }

  async read(data: ResourceData<SignatureAssociateAttributes>): Promise<void> {
    let bindings: SignatureBinding[];
    try {
      bindings = await this.listBindings(this.client(data), data.get('instance_id'), data.get('signature_id'));
    } catch (error) {
      if (isNotFound(error)) {
        data.markGone();
        return;
      }
      throw wrapError('error retrieving signature association', error);
    }

    if (bindings.length === 0) {
      debugSignature('signature %s has no bound APIs', data.get('signature_id'));
      data.markGone();
      return;
    }

    data.set('region', data.get('region') ?? this.clients.region);
    data.set('publish_ids', uniqueSorted(bindings.map((b) => b.publish_id)));
  }

  async update(data: ResourceData<SignatureAssociateAttributes>): Promise<void> {
    data.inheritComputed(await this.getSchema());
    const client = this.client(data);
    const change = data.getChange('publish_ids');
    const before = new Set(change.old ?? []);
    const after = new Set(change.new);

    const removed = [...before].filter((id) => !after.has(id));
    const added = [...after].filter((id) => !before.has(id));

    if (removed.length > 0) await this.unbind(client, data, removed, data.timeout('update'));
    if (added.length > 0) await this.bind(client, data, added, data.timeout('update'));

    await this.read(data);
  }

  async delete(data: ResourceData<SignatureAssociateAttributes>): Promise<void> {
    await this.unbind(this.client(data), data, data.get('publish_ids'), data.timeout('delete'));
  }

  async importState(importId: string): Promise<ResourceData<SignatureAssociateAttributes>> {
    const [instanceId, signatureId] = parseImportId(importId, ['instance_id', 'signature_id']);

    const bindings = await this.listBindings(this.clients.get('apig'), instanceId, signatureId);
    if (bindings.length === 0) throw new Error(`signature (${signatureId}) has no bound APIs on instance ${instanceId}`);

    return new ResourceData(
      { region: this.clients.region, instance_id: instanceId, signature_id: signatureId, publish_ids: uniqueSorted(bindings.map((b) => b.publish_id)) },
      { id: `${instanceId}/${signatureId}`, timeouts: this.timeouts }
    );
  }
}
