import type { Attributes, IDataSourceHandler, IProvider, IResourceHandler, ISchema, OperationOptions, ResourceSnapshot, ResourceTimeouts, TimeoutKind } from '@skyform/contracts';
import { ReplacementRequiredError, ResourceData, sameValue } from '@skyform/contracts';
import type { IClientFactory, ProviderConfig } from '@skyform/transport';
import { ClientFactory, loadProviderConfig } from '@skyform/transport';
import debug from 'debug';

import { IMAGE_TRIGGERS_TYPE, ImageTriggersDataSource } from './datasources/ImageTriggersDataSource';
import { ALERT_RULE_TYPE, AlertRuleResource } from './resources/AlertRuleResource';
import { SIGNATURE_ASSOCIATE_TYPE, SignatureAssociateResource } from './resources/SignatureAssociateResource';

const debugProvider = debug('skyform:provider');

/** A handler with its attribute type erased, as the untyped facade drives it */
interface BoundResource {
  getSchema(): Promise<ISchema>;
  validate(inputs: Record<string, unknown>): Promise<void>;
  create(inputs: Record<string, unknown>, options: OperationOptions): Promise<ResourceSnapshot>;
  read(id: string, inputs: Record<string, unknown>): Promise<ResourceSnapshot | null>;
  update(id: string, prior: Record<string, unknown>, desired: Record<string, unknown>, options: OperationOptions): Promise<ResourceSnapshot>;
  delete(id: string, inputs: Record<string, unknown>, options: OperationOptions): Promise<void>;
  importResource(importId: string): Promise<ResourceSnapshot>;
}

interface BoundDataSource {
  getSchema(): Promise<ISchema>;
  read(inputs: Record<string, unknown>): Promise<Record<string, unknown>>;
}

export interface CloudProviderOptions {
  /** Smallest spacing between polls of eventually consistent operations, in milliseconds */
  pollInterval?: number;
}

function timeoutsFor(defaults: Partial<ResourceTimeouts> | undefined, kind: TimeoutKind, options: OperationOptions): Partial<ResourceTimeouts> {
  return options.timeout === undefined ? { ...defaults } : { ...defaults, [kind]: options.timeout };
}

/** Names the forceNew attributes whose desired value differs from the prior one */
export function replacedAttributes(schema: ISchema, prior: Attributes, desired: Attributes): string[] {
  return Object.entries(schema)
    .filter(([key, def]) => def.forceNew && desired[key] !== undefined && !sameValue(prior[key], desired[key]))
    .map(([key]) => key);
}

function bindResource<T extends Attributes>(type: string, handler: IResourceHandler<T>): BoundResource {
  return {
    getSchema: () => handler.getSchema(),

    validate: async (inputs) => {
      await handler.validate(inputs);
    },

    create: async (inputs, options) => {
      const data = new ResourceData(await handler.validate(inputs), { timeouts: timeoutsFor(handler.timeouts, 'create', options) });
      await handler.create(data);
      if (data.isGone) throw new Error(`${type}: the resource was created but disappeared before it could be read`);

      return data.toSnapshot();
    },

    read: async (id, inputs) => {
      const data = new ResourceData(await handler.validate(inputs), { id, timeouts: handler.timeouts });
      await handler.read(data);

      return data.isGone ? null : data.toSnapshot();
    },

    update: async (id, prior, desired, options) => {
      const priorAttrs = await handler.validate(prior);
      const desiredAttrs = await handler.validate(desired);

      const replaced = replacedAttributes(await handler.getSchema(), priorAttrs, desiredAttrs);
      if (replaced.length > 0) throw new ReplacementRequiredError(type, replaced);

      const data = new ResourceData(desiredAttrs, { id, prior: priorAttrs, timeouts: timeoutsFor(handler.timeouts, 'update', options) });
      await handler.update(data);
      if (data.isGone) throw new Error(`${type}: resource ${id} disappeared during update`);

      return data.toSnapshot();
    },

    delete: async (id, inputs, options) => {
      const data = new ResourceData(await handler.validate(inputs), { id, timeouts: timeoutsFor(handler.timeouts, 'delete', options) });
      await handler.delete(data);
    },

    importResource: async (importId) => (await handler.importState(importId)).toSnapshot(),
  };
}

function bindDataSource<I extends Attributes, O extends Attributes>(handler: IDataSourceHandler<I, O>): BoundDataSource {
  return {
    getSchema: () => handler.getSchema(),
    read: async (inputs) => handler.read(await handler.validate(inputs)),
  };
}

/**
 * Cloud provider: dispatches single resource and data source operations to their typed handlers.
 */
export class CloudProvider implements IProvider {
  private handlers: Map<string, BoundResource> = new Map();
  private sources: Map<string, BoundDataSource> = new Map();

  constructor(clients: IClientFactory, options: CloudProviderOptions = {}) {
    this.register(ALERT_RULE_TYPE, new AlertRuleResource(clients));
    this.register(SIGNATURE_ASSOCIATE_TYPE, new SignatureAssociateResource(clients, { pollInterval: options.pollInterval }));
    this.sources.set(IMAGE_TRIGGERS_TYPE, bindDataSource(new ImageTriggersDataSource(clients)));
  }

  get resources(): string[] {
    return [...this.handlers.keys()];
  }

  get dataSources(): string[] {
    return [...this.sources.keys()];
  }

  private register<T extends Attributes>(type: string, handler: IResourceHandler<T>): void {
    this.handlers.set(type, bindResource(type, handler));
  }

  private handler(type: string): BoundResource {
    const handler = this.handlers.get(type);
    if (!handler) throw new Error(`Unsupported resource type: ${type}`);

    return handler;
  }

  private source(type: string): BoundDataSource {
    const source = this.sources.get(type);
    if (!source) throw new Error(`Unsupported data source type: ${type}`);

    return source;
  }

  async getSchema(type: string): Promise<ISchema> {
    const handler = this.handlers.get(type) ?? this.sources.get(type);
    if (!handler) throw new Error(`Unsupported resource type: ${type}`);

    return await handler.getSchema();
  }

  async validate(type: string, inputs: Record<string, unknown>): Promise<void> {
    await this.handler(type).validate(inputs);
  }

  async create(type: string, inputs: Record<string, unknown>, options: OperationOptions = {}): Promise<ResourceSnapshot> {
    debugProvider('create %s', type);
    return await this.handler(type).create(inputs, options);
  }

  async read(type: string, id: string, inputs: Record<string, unknown>): Promise<ResourceSnapshot | null> {
    return await this.handler(type).read(id, inputs);
  }

  async update(type: string, id: string, prior: Record<string, unknown>, desired: Record<string, unknown>, options: OperationOptions = {}): Promise<ResourceSnapshot> {
    debugProvider('update %s %s', type, id);
    return await this.handler(type).update(id, prior, desired, options);
  }

  async delete(type: string, id: string, inputs: Record<string, unknown>, options: OperationOptions = {}): Promise<void> {
    debugProvider('delete %s %s', type, id);
    await this.handler(type).delete(id, inputs, options);
  }

  async importResource(type: string, importId: string): Promise<ResourceSnapshot> {
    return await this.handler(type).importResource(importId);
  }

  async readDataSource(type: string, inputs: Record<string, unknown>): Promise<Record<string, unknown>> {
    return await this.source(type).read(inputs);
  }
}

/** Builds a provider from the environment (SKYFORM_* variables), with optional overrides */
export function createProvider(env: NodeJS.ProcessEnv = process.env, overrides: Partial<ProviderConfig> = {}, options: CloudProviderOptions = {}): CloudProvider {
  return new CloudProvider(new ClientFactory(loadProviderConfig(env, overrides)), options);
}

export { AlertRuleResource, ALERT_RULE_TYPE, buildCreateAlertRuleBody, buildUpdateAlertRuleBody, flattenAlertRule } from './resources/AlertRuleResource';
export type { AlertRuleAttributes, AlertRuleDetail } from './resources/AlertRuleResource';
export { SignatureAssociateResource, SIGNATURE_ASSOCIATE_TYPE, bindingCompleted, unbindingCompleted } from './resources/SignatureAssociateResource';
export type { SignatureAssociateAttributes, SignatureBinding } from './resources/SignatureAssociateResource';
export { ImageTriggersDataSource, IMAGE_TRIGGERS_TYPE, filterTriggers, flattenTrigger } from './datasources/ImageTriggersDataSource';
export type { ImageTrigger, ImageTriggersInputs, ImageTriggersResult } from './datasources/ImageTriggersDataSource';
export { ValidationError } from './common';
