import type { IResourceHandler, ISchema } from '@skyform/contracts';
import { ResourceData } from '@skyform/contracts';
import type { IClientFactory, IServiceClient } from '@skyform/transport';
import { isNotFound } from '@skyform/transport';
import debug from 'debug';
import { z } from 'zod';

import { formatTimestamp, parseImportId, parseInputs, parseResponse, removeNil, valueIgnoreEmpty, wrapError } from '../common';

const debugAlertRule = debug('skyform:provider:alert-rule');

export const ALERT_RULE_TYPE = 'secmaster_alert_rule';

const RULES_PATH = 'v1/{project_id}/workspaces/{workspace_id}/siem/alert-rules';
const RULE_PATH = 'v1/{project_id}/workspaces/{workspace_id}/siem/alert-rules/{id}';
const RULE_STATUS_PATH = 'v1/{project_id}/workspaces/{workspace_id}/siem/alert-rules/{action}';

const queryPlanSchema = z.object({
  query_interval: z.number().int(),
  query_interval_unit: z.string().min(1),
  time_window: z.number().int(),
  time_window_unit: z.string().min(1),
  execution_delay: z.number().int().optional(),
  overtime_interval: z.number().int().optional(),
});

const triggerSchema = z.object({
  expression: z.string().min(1),
  operator: z.string().min(1),
  accumulated_times: z.number().int(),
  mode: z.string().min(1),
  severity: z.string().min(1),
});

export const alertRuleSchema = z.object({
  region: z.string().min(1).optional(),
  workspace_id: z.string().min(1),
  pipeline_id: z.string().min(1),
  name: z.string().min(1),
  severity: z.string().min(1),
  type: z.record(z.string()),
  description: z.string(),
  status: z.enum(['ENABLED', 'DISABLED']),
  query_rule: z.string().min(1),
  query_plan: queryPlanSchema,
  triggers: z.array(triggerSchema).min(1).max(5),
  query_type: z.string().min(1),
  custom_information: z.record(z.string()).optional(),
  event_grouping: z.boolean().default(true),
  debugging_alarm: z.boolean().default(true),
  suppression: z.boolean().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type AlertRuleAttributes = z.output<typeof alertRuleSchema>;
export type AlertRuleQueryPlan = z.output<typeof queryPlanSchema>;
export type AlertRuleTrigger = z.output<typeof triggerSchema>;

const ruleDetailSchema = z.object({
  pipe_id: z.string(),
  rule_name: z.string(),
  severity: z.string(),
  alert_type: z.record(z.string()).nullish(),
  description: z.string().nullish(),
  status: z.enum(['ENABLED', 'DISABLED']),
  query: z.string(),
  query_type: z.string(),
  schedule: z.object({
    frequency_interval: z.number(),
    frequency_unit: z.string(),
    period_interval: z.number(),
    period_unit: z.string(),
    delay_interval: z.number().nullish(),
    overtime_interval: z.number().nullish(),
  }),
  custom_properties: z.record(z.string()).nullish(),
  event_grouping: z.boolean().nullish(),
  simulation: z.boolean().nullish(),
  triggers: z.array(triggerSchema).nullish(),
  suppression: z.boolean().nullish(),
  create_time: z.number().nullish(),
  update_time: z.number().nullish(),
});

export type AlertRuleDetail = z.output<typeof ruleDetailSchema>;

const createResponseSchema = z.object({ rule_id: z.string().min(1) });

/** Attributes sent through the update call; `status` has its own enable/disable calls */
const CONTENT_ATTRIBUTES = [
  'name',
  'severity',
  'type',
  'description',
  'query_rule',
  'query_type',
  'query_plan',
  'custom_information',
  'event_grouping',
  'debugging_alarm',
  'triggers',
  'suppression',
] as const;

function buildSchedule(plan: AlertRuleQueryPlan): Record<string, unknown> {
  return removeNil({
    frequency_interval: valueIgnoreEmpty(plan.query_interval),
    frequency_unit: valueIgnoreEmpty(plan.query_interval_unit),
    period_interval: valueIgnoreEmpty(plan.time_window),
    period_unit: valueIgnoreEmpty(plan.time_window_unit),
    delay_interval: valueIgnoreEmpty(plan.execution_delay),
    overtime_interval: valueIgnoreEmpty(plan.overtime_interval),
  });
}

function buildTriggers(triggers: AlertRuleTrigger[]): Record<string, unknown>[] {
  return triggers.map((trigger) =>
    removeNil({
      expression: valueIgnoreEmpty(trigger.expression),
      operator: valueIgnoreEmpty(trigger.operator),
      accumulated_times: valueIgnoreEmpty(trigger.accumulated_times),
      mode: valueIgnoreEmpty(trigger.mode),
      severity: valueIgnoreEmpty(trigger.severity),
    })
  );
}

export function buildCreateAlertRuleBody(attrs: AlertRuleAttributes): Record<string, unknown> {
  return removeNil({
    pipe_id: attrs.pipeline_id,
    rule_name: attrs.name,
    severity: attrs.severity,
    alert_type: attrs.type,
    description: attrs.description,
    status: attrs.status,
    query: attrs.query_rule,
    query_type: attrs.query_type,
    schedule: buildSchedule(attrs.query_plan),
    custom_properties: valueIgnoreEmpty(attrs.custom_information),
    event_grouping: attrs.event_grouping,
    simulation: attrs.debugging_alarm,
    triggers: buildTriggers(attrs.triggers),
    suppression: attrs.suppression,
  });
}

export function buildUpdateAlertRuleBody(attrs: AlertRuleAttributes): Record<string, unknown> {
  return removeNil({
    rule_name: valueIgnoreEmpty(attrs.name),
    severity: valueIgnoreEmpty(attrs.severity),
    alert_type: valueIgnoreEmpty(attrs.type),
    description: valueIgnoreEmpty(attrs.description),
    status: valueIgnoreEmpty(attrs.status),
    query: valueIgnoreEmpty(attrs.query_rule),
    query_type: valueIgnoreEmpty(attrs.query_type),
    schedule: buildSchedule(attrs.query_plan),
    custom_properties: valueIgnoreEmpty(attrs.custom_information),
    event_grouping: attrs.event_grouping,
    simulation: attrs.debugging_alarm,
    triggers: buildTriggers(attrs.triggers),
    suppression: attrs.suppression,
  });
}

export function flattenAlertRule(rule: AlertRuleDetail, region: string, workspaceId: string): AlertRuleAttributes {
  return {
    region,
    workspace_id: workspaceId,
    pipeline_id: rule.pipe_id,
    name: rule.rule_name,
    severity: rule.severity,
    type: rule.alert_type ?? {},
    description: rule.description ?? '',
    status: rule.status,
    query_rule: rule.query,
    query_type: rule.query_type,
    query_plan: {
      query_interval: rule.schedule.frequency_interval,
      query_interval_unit: rule.schedule.frequency_unit,
      time_window: rule.schedule.period_interval,
      time_window_unit: rule.schedule.period_unit,
      execution_delay: rule.schedule.delay_interval ?? undefined,
      overtime_interval: rule.schedule.overtime_interval ?? undefined,
    },
    triggers: rule.triggers ?? [],
    custom_information: rule.custom_properties ?? undefined,
    event_grouping: rule.event_grouping ?? true,
    debugging_alarm: rule.simulation ?? true,
    suppression: rule.suppression ?? undefined,
    created_at: formatTimestamp(rule.create_time ?? undefined),
    updated_at: formatTimestamp(rule.update_time ?? undefined),
  };
}

/**
 * SecMaster SIEM alert rule.
 * Content changes go through PUT; status flips through the enable/disable actions.
 */
export class AlertRuleResource implements IResourceHandler<AlertRuleAttributes> {
  constructor(private readonly clients: IClientFactory) {}

  async getSchema(): Promise<ISchema> {
    return {
      region: { type: 'string', optional: true, computed: true, forceNew: true, description: 'Defaults to the provider region' },
      workspace_id: { type: 'string', required: true, forceNew: true, description: 'Workspace the alert rule belongs to' },
      pipeline_id: { type: 'string', required: true, forceNew: true },
      name: { type: 'string', required: true },
      severity: { type: 'string', required: true },
      type: { type: 'map', elemType: 'string', required: true },
      description: { type: 'string', required: true },
      status: { type: 'string', required: true, description: 'ENABLED or DISABLED' },
      query_rule: { type: 'string', required: true },
      query_plan: {
        type: 'object',
        required: true,
        elem: {
          query_interval: { type: 'number', required: true },
          query_interval_unit: { type: 'string', required: true },
          time_window: { type: 'number', required: true },
          time_window_unit: { type: 'string', required: true },
          execution_delay: { type: 'number', computed: true },
          overtime_interval: { type: 'number', computed: true },
        },
      },
      triggers: {
        type: 'list',
        required: true,
        minItems: 1,
        maxItems: 5,
        elem: {
          expression: { type: 'string', required: true },
          operator: { type: 'string', required: true },
          accumulated_times: { type: 'number', required: true },
          mode: { type: 'string', required: true },
          severity: { type: 'string', required: true },
        },
      },
      query_type: { type: 'string', required: true },
      custom_information: { type: 'map', elemType: 'string', computed: true },
      event_grouping: { type: 'boolean', default: true },
      debugging_alarm: { type: 'boolean', default: true, description: 'Whether to generate debugging alarms' },
      suppression: { type: 'boolean', computed: true },
      created_at: { type: 'string', computed: true },
      updated_at: { type: 'string', computed: true },
    };
  }

  async validate(inputs: Record<string, unknown>): Promise<AlertRuleAttributes> {
    return parseInputs(ALERT_RULE_TYPE, alertRuleSchema, inputs);
  }

  private client(data: ResourceData<AlertRuleAttributes>): IServiceClient {
    return this.clients.get('secmaster', data.get('region'));
  }

  async create(data: ResourceData<AlertRuleAttributes>): Promise<void> {
    const client = this.client(data);
    const path = client.buildPath(RULES_PATH, { workspace_id: data.get('workspace_id') });

    let body: unknown;
    try {
      body = await client.request('POST', path, { body: buildCreateAlertRuleBody(data.attributes()), okCodes: [200] });
    } catch (error) {
      throw wrapError('error creating alert rule', error);
    }

    const created = createResponseSchema.safeParse(body);
    if (!created.success) throw new Error('error creating alert rule: ID is not found in API response');

    data.setId(created.data.rule_id);
    debugAlertRule('created alert rule %s', data.id);

    await this.read(data);
  }

  /** Resolves to null when the rule no longer exists */
  private async fetchRule(client: IServiceClient, workspaceId: string, id: string): Promise<AlertRuleDetail | null> {
    let body: unknown;
    try {
      body = await client.request('GET', client.buildPath(RULE_PATH, { workspace_id: workspaceId, id }), { okCodes: [200] });
    } catch (error) {
      if (isNotFound(error)) return null;
      throw wrapError(`error retrieving alert rule (${id})`, error);
    }

    return parseResponse('alert rule', ruleDetailSchema, body);
  }

  async read(data: ResourceData<AlertRuleAttributes>): Promise<void> {
    const rule = await this.fetchRule(this.client(data), data.get('workspace_id'), data.id);
    if (!rule) {
      debugAlertRule('alert rule %s is gone', data.id);
      data.markGone();
      return;
    }

    data.merge(flattenAlertRule(rule, data.get('region') ?? this.clients.region, data.get('workspace_id')));
  }

  async update(data: ResourceData<AlertRuleAttributes>): Promise<void> {
    data.inheritComputed(await this.getSchema());
    const client = this.client(data);
    const workspaceId = data.get('workspace_id');

    if (data.hasChanges(...CONTENT_ATTRIBUTES)) {
      try {
        await client.request('PUT', client.buildPath(RULE_PATH, { workspace_id: workspaceId, id: data.id }), {
          body: buildUpdateAlertRuleBody(data.attributes()),
          okCodes: [200],
        });
      } catch (error) {
        throw wrapError(`error updating alert rule (${data.id})`, error);
      }
    }

    if (data.hasChange('status')) {
      const action = data.get('status') === 'ENABLED' ? 'enable' : 'disable';
      try {
        await client.request('POST', client.buildPath(RULE_STATUS_PATH, { workspace_id: workspaceId, action }), { body: [data.id], okCodes: [200] });
      } catch (error) {
        throw wrapError(`error updating alert rule (${data.id}) status`, error);
      }
    }

    await this.read(data);
  }

  async delete(data: ResourceData<AlertRuleAttributes>): Promise<void> {
    const client = this.client(data);

    try {
      await client.request('DELETE', client.buildPath(RULES_PATH, { workspace_id: data.get('workspace_id') }), { body: [data.id], okCodes: [200] });
    } catch (error) {
      throw wrapError(`error deleting alert rule (${data.id})`, error);
    }
  }

  async importState(importId: string): Promise<ResourceData<AlertRuleAttributes>> {
    const [workspaceId, ruleId] = parseImportId(importId, ['workspace_id', 'rule_id']);

    const rule = await this.fetchRule(this.clients.get('secmaster'), workspaceId, ruleId);
    if (!rule) throw new Error(`alert rule (${ruleId}) not found in workspace ${workspaceId}`);

    return new ResourceData(flattenAlertRule(rule, this.clients.region, workspaceId), { id: ruleId });
  }
}
