import { randomUUID } from 'node:crypto';

import type { IDataSourceHandler, ISchema } from '@skyform/contracts';
import type { IClientFactory } from '@skyform/transport';
import debug from 'debug';
import { z } from 'zod';

import { parseInputs, parseResponse, wrapError } from '../common';

const debugTriggers = debug('skyform:provider:image-triggers');

export const IMAGE_TRIGGERS_TYPE = 'swr_image_triggers';

const TRIGGERS_PATH = 'v2/manage/namespaces/{organization}/repos/{repository}/triggers';

export const imageTriggersInputSchema = z.object({
  region: z.string().min(1).optional(),
  organization: z.string().min(1),
  repository: z.string().min(1),
  name: z.string().optional(),
  enabled: z.enum(['true', 'false']).optional(),
  condition_type: z.enum(['all', 'tag', 'regular']).optional(),
  cluster_name: z.string().optional(),
});

export type ImageTriggersInputs = z.output<typeof imageTriggersInputSchema>;

const triggerResponseSchema = z.object({
  name: z.string(),
  enable: z.string().nullish(),
  trigger_type: z.string().nullish(),
  trigger_mode: z.string().nullish(),
  condition: z.string().nullish(),
  action: z.string().nullish(),
  app_type: z.string().nullish(),
  application: z.string().nullish(),
  cluster_id: z.string().nullish(),
  cluster_name: z.string().nullish(),
  cluster_ns: z.string().nullish(),
  creator_name: z.string().nullish(),
  created: z.string().nullish(),
});

const triggerListSchema = z.array(triggerResponseSchema);

export type ImageTrigger = {
  name: string;
  enabled: string;
  type: string;
  condition_type: string;
  condition_value: string;
  action: string;
  workload_type: string;
  workload_name: string;
  cluster_id: string;
  cluster_name: string;
  namespace: string;
  creator_name: string;
  created_at: string;
};

export type ImageTriggersResult = {
  id: string;
  region: string;
  triggers: ImageTrigger[];
};

export function flattenTrigger(trigger: z.output<typeof triggerResponseSchema>): ImageTrigger {
  return {
    name: trigger.name,
    enabled: trigger.enable ?? '',
    type: trigger.trigger_type ?? '',
    condition_type: trigger.trigger_mode ?? '',
    condition_value: trigger.condition ?? '',
    action: trigger.action ?? '',
    workload_type: trigger.app_type ?? '',
    workload_name: trigger.application ?? '',
    cluster_id: trigger.cluster_id ?? '',
    cluster_name: trigger.cluster_name ?? '',
    namespace: trigger.cluster_ns ?? '',
    creator_name: trigger.creator_name ?? '',
    created_at: trigger.created ?? '',
  };
}

/** Keeps the triggers matching every filter that was given */
export function filterTriggers(triggers: ImageTrigger[], filters: Pick<ImageTriggersInputs, 'name' | 'enabled' | 'condition_type' | 'cluster_name'>): ImageTrigger[] {
  return triggers.filter((trigger) => {
    if (filters.name && trigger.name !== filters.name) return false;
    if (filters.enabled && trigger.enabled !== filters.enabled) return false;
    if (filters.condition_type && trigger.condition_type !== filters.condition_type) return false;
    if (filters.cluster_name && trigger.cluster_name !== filters.cluster_name) return false;
    return true;
  });
}

/**
 * Lists the image triggers of an image repository.
 */
export class ImageTriggersDataSource implements IDataSourceHandler<ImageTriggersInputs, ImageTriggersResult> {
  constructor(private readonly clients: IClientFactory) {}

  async getSchema(): Promise<ISchema> {
    return {
      region: { type: 'string', optional: true, computed: true },
      organization: { type: 'string', required: true, description: 'Organization the repository belongs to' },
      repository: { type: 'string', required: true, description: 'Repository name; a "/" in it is sent as "$"' },
      name: { type: 'string' },
      enabled: { type: 'string', description: '"true" or "false"' },
      condition_type: { type: 'string', description: 'One of all, tag, regular' },
      cluster_name: { type: 'string' },
      triggers: {
        type: 'list',
        computed: true,
        elem: {
          name: { type: 'string', computed: true },
          enabled: { type: 'string', computed: true },
          type: { type: 'string', computed: true },
          condition_type: { type: 'string', computed: true },
          condition_value: { type: 'string', computed: true },
          action: { type: 'string', computed: true },
          workload_type: { type: 'string', computed: true },
          workload_name: { type: 'string', computed: true },
          cluster_id: { type: 'string', computed: true },
          cluster_name: { type: 'string', computed: true },
          namespace: { type: 'string', computed: true },
          creator_name: { type: 'string', computed: true },
          created_at: { type: 'string', computed: true },
        },
      },
    };
  }

  async validate(inputs: Record<string, unknown>): Promise<ImageTriggersInputs> {
    return parseInputs(IMAGE_TRIGGERS_TYPE, imageTriggersInputSchema, inputs);
  }

  async read(inputs: ImageTriggersInputs): Promise<ImageTriggersResult> {
    const region = inputs.region ?? this.clients.region;
    const client = this.clients.get('swr', region);
    const path = client.buildPath(TRIGGERS_PATH, { organization: inputs.organization, repository: inputs.repository.replaceAll('/', '$') });

    let body: unknown;
    try {
      body = await client.request('GET', path, { okCodes: [200] });
    } catch (error) {
      throw wrapError('error retrieving SWR image triggers', error);
    }

    const triggers = parseResponse('image trigger list', triggerListSchema, body ?? []).map(flattenTrigger);
    const matched = filterTriggers(triggers, inputs);
    debugTriggers('%s/%s: %d of %d triggers match', inputs.organization, inputs.repository, matched.length, triggers.length);

    return { id: randomUUID(), region, triggers: matched };
  }
}
