import type { ResourceData, ResourceTimeouts } from './ResourceData';

export { ResourceData, DEFAULT_TIMEOUT_MS } from './ResourceData';
export type { ResourceDataOptions, ResourceTimeouts, TimeoutKind } from './ResourceData';
export { inheritComputed, sameValue } from './values';

export type SchemaType = 'string' | 'number' | 'boolean' | 'list' | 'set' | 'map' | 'object';

export interface ISchemaDefinition {
  type: SchemaType;
  required?: boolean;
  computed?: boolean;
  /** Computed attributes that a config may still set */
  optional?: boolean;
  forceNew?: boolean; // A change to this attribute cannot be applied in place
  default?: string | number | boolean;
  elemType?: SchemaType;
  elem?: ISchema;
  minItems?: number;
  maxItems?: number;
  description?: string;
}

export type ISchema = Record<string, ISchemaDefinition>;

/** Provider-agnostic view of one managed resource */
export interface ResourceSnapshot {
  id: string;
  attributes: Record<string, unknown>;
}

export interface OperationOptions {
  /** Overrides the handler's timeout for this operation, in milliseconds */
  timeout?: number;
}

export type Attributes = Record<string, unknown>;

/**
 * Resource Handler Interface
 * Each resource type (e.g. secmaster_alert_rule) implements this interface over its own typed attributes.
 */
export interface IResourceHandler<T extends Attributes> {
  readonly timeouts?: Partial<ResourceTimeouts>;

  getSchema(): Promise<ISchema>;

  /**
   * Validate raw inputs and turn them into typed attributes. Throws if invalid.
   */
  validate(inputs: Record<string, unknown>): Promise<T>;

  /**
   * Create the remote object and set the resource ID on `data`
   */
  create(data: ResourceData<T>): Promise<void>;

  /**
   * Refresh `data` from the remote object. Calls `data.markGone()` when it no longer exists.
   */
  read(data: ResourceData<T>): Promise<void>;

  update(data: ResourceData<T>): Promise<void>;

  delete(data: ResourceData<T>): Promise<void>;

  /**
   * Resolve an import ID into a fully read resource. Throws when the remote object does not exist.
   */
  importState(importId: string): Promise<ResourceData<T>>;
}

export interface IDataSourceHandler<I extends Attributes, O extends Attributes> {
  getSchema(): Promise<ISchema>;
  validate(inputs: Record<string, unknown>): Promise<I>;
  read(inputs: I): Promise<O>;
}

/** The contract the CLI (or any other host) drives */
export interface IProvider {
  /** Resource types handled by this provider (e.g., ['secmaster_alert_rule']) */
  readonly resources: string[];
  readonly dataSources: string[];

  getSchema(type: string): Promise<ISchema>;

  /** Validates inputs against the resource schema. Throws validation error if invalid. */
  validate(type: string, inputs: Record<string, unknown>): Promise<void>;

  create(type: string, inputs: Record<string, unknown>, options?: OperationOptions): Promise<ResourceSnapshot>;

  /** Resolves to null when the remote object is gone */
  read(type: string, id: string, inputs: Record<string, unknown>): Promise<ResourceSnapshot | null>;

  update(type: string, id: string, prior: Record<string, unknown>, desired: Record<string, unknown>, options?: OperationOptions): Promise<ResourceSnapshot>;

  delete(type: string, id: string, inputs: Record<string, unknown>, options?: OperationOptions): Promise<void>;

  importResource(type: string, importId: string): Promise<ResourceSnapshot>;

  readDataSource(type: string, inputs: Record<string, unknown>): Promise<Record<string, unknown>>;
}

/** Thrown when an update touches attributes that can only be set on creation */
export class ReplacementRequiredError extends Error {
  constructor(
    readonly resourceType: string,
    readonly attributes: string[]
  ) {
    super(`${resourceType}: changing ${attributes.map((a) => `"${a}"`).join(', ')} requires replacing the resource`);
    this.name = 'ReplacementRequiredError';
  }
}
