import type { ISchema, ResourceSnapshot } from './index';
import { inheritComputed, sameValue } from './values';

export type TimeoutKind = 'create' | 'update' | 'delete';

export type ResourceTimeouts = Record<TimeoutKind, number>;

export const DEFAULT_TIMEOUT_MS = 20 * 60 * 1000;

export interface ResourceDataOptions<T> {
  id?: string;
  /** Attributes as last observed; change detection compares against these */
  prior?: T;
  timeouts?: Partial<ResourceTimeouts>;
}

/**
 * Typed configuration store for a single resource.
 * Holds the desired attributes, the prior (observed) ones, and the resource ID.
 */
export class ResourceData<T extends Record<string, unknown>> {
  private resourceId: string;
  private readonly prior: T | undefined;
  private current: T;
  private readonly timeouts: ResourceTimeouts;

  constructor(attributes: T, options: ResourceDataOptions<T> = {}) {
    this.current = { ...attributes };
    this.prior = options.prior ? { ...options.prior } : undefined;
    this.resourceId = options.id ?? '';
    this.timeouts = {
      create: options.timeouts?.create ?? DEFAULT_TIMEOUT_MS,
      update: options.timeouts?.update ?? DEFAULT_TIMEOUT_MS,
      delete: options.timeouts?.delete ?? DEFAULT_TIMEOUT_MS,
    };
  }

  get id(): string {
    return this.resourceId;
  }

  setId(id: string): void {
    this.resourceId = id;
  }

  /** The remote object no longer exists */
  markGone(): void {
    this.resourceId = '';
  }

  get isGone(): boolean {
    return this.resourceId === '';
  }

  get<K extends keyof T>(key: K): T[K] {
    return this.current[key];
  }

  set<K extends keyof T>(key: K, value: T[K]): void {
    this.current[key] = value;
  }

  /** Sets several attributes at once; keys present with an undefined value are cleared */
  merge(values: Partial<T>): void {
    Object.assign(this.current, values);
  }

  hasChange(key: keyof T): boolean {
    if (!this.prior) return this.current[key] !== undefined;

    return !sameValue(this.prior[key], this.current[key]);
  }

  /** Takes computed attributes the desired config leaves out from the prior state */
  inheritComputed(schema: ISchema): void {
    if (this.prior) inheritComputed(schema, this.prior, this.current);
  }

  hasChanges(...keys: (keyof T)[]): boolean {
    return keys.some((key) => this.hasChange(key));
  }

  getChange<K extends keyof T>(key: K): { old: T[K] | undefined; new: T[K] } {
    return { old: this.prior?.[key], new: this.current[key] };
  }

  timeout(kind: TimeoutKind): number {
    return this.timeouts[kind];
  }

  attributes(): T {
    return { ...this.current };
  }

  toSnapshot(): ResourceSnapshot {
    return { id: this.resourceId, attributes: this.attributes() };
  }
}
