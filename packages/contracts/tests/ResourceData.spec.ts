import { describe, expect, it } from 'vitest';

import { DEFAULT_TIMEOUT_MS, ReplacementRequiredError, ResourceData } from '../src/index';

type Binding = {
  instance_id: string;
  publish_ids: string[];
  region?: string;
};

describe('ResourceData', () => {
  it('should treat every set attribute as changed when there is no prior state', () => {
    const data = new ResourceData<Binding>({ instance_id: 'inst-1', publish_ids: ['p1'] });

    expect(data.hasChange('instance_id')).toBe(true);
    expect(data.hasChange('region')).toBe(false);
  });

  it('should compare against prior attributes', () => {
    const data = new ResourceData<Binding>({ instance_id: 'inst-1', publish_ids: ['p1', 'p2'] }, { id: 'inst-1/sig-1', prior: { instance_id: 'inst-1', publish_ids: ['p1'] } });

    expect(data.hasChange('instance_id')).toBe(false);
    expect(data.hasChange('publish_ids')).toBe(true);
    expect(data.hasChanges('instance_id', 'region')).toBe(false);
    expect(data.getChange('publish_ids')).toEqual({ old: ['p1'], new: ['p1', 'p2'] });
  });

  it('should ignore key order and unset keys when comparing values', () => {
    type Rule = { type: Record<string, string>; plan: { interval: number; delay?: number } };
    const data = new ResourceData<Rule>({ type: { a: '1', b: '2' }, plan: { interval: 5, delay: undefined } }, { prior: { type: { b: '2', a: '1' }, plan: { interval: 5 } } });

    expect(data.hasChanges('type', 'plan')).toBe(false);
  });

  it('should take computed attributes the desired config leaves out from the prior state', () => {
    type Rule = { region?: string; name: string; plan: { interval: number; delay?: number } };
    const schema = {
      region: { type: 'string' as const, optional: true, computed: true },
      name: { type: 'string' as const, required: true },
      plan: { type: 'object' as const, elem: { interval: { type: 'number' as const }, delay: { type: 'number' as const, computed: true } } },
    };
    const data = new ResourceData<Rule>({ name: 'renamed', plan: { interval: 5 } }, { prior: { region: 'region-1', name: 'rule', plan: { interval: 5, delay: 0 } } });

    data.inheritComputed(schema);

    expect(data.attributes()).toEqual({ region: 'region-1', name: 'renamed', plan: { interval: 5, delay: 0 } });
    expect(data.hasChanges('region', 'plan')).toBe(false);
    expect(data.hasChange('name')).toBe(true);
  });

  it('should keep a computed attribute the desired config sets', () => {
    type Binding = { region?: string };
    const data = new ResourceData<Binding>({ region: 'region-2' }, { prior: { region: 'region-1' } });

    data.inheritComputed({ region: { type: 'string', optional: true, computed: true } });

    expect(data.getChange('region')).toEqual({ old: 'region-1', new: 'region-2' });
  });

  it('should get and set typed attributes without touching the input object', () => {
    const input: Binding = { instance_id: 'inst-1', publish_ids: [] };
    const data = new ResourceData<Binding>(input);

    data.set('region', 'region-1');

    expect(data.get('region')).toBe('region-1');
    expect(input.region).toBeUndefined();
  });

  it('should track the resource ID and gone state', () => {
    const data = new ResourceData<Binding>({ instance_id: 'inst-1', publish_ids: [] });
    expect(data.isGone).toBe(true);

    data.setId('inst-1/sig-1');
    expect(data.id).toBe('inst-1/sig-1');
    expect(data.isGone).toBe(false);

    data.markGone();
    expect(data.toSnapshot().id).toBe('');
  });

  it('should merge timeouts with the default', () => {
    const data = new ResourceData<Binding>({ instance_id: 'inst-1', publish_ids: [] }, { timeouts: { delete: 1000 } });

    expect(data.timeout('delete')).toBe(1000);
    expect(data.timeout('create')).toBe(DEFAULT_TIMEOUT_MS);
  });
});

describe('ReplacementRequiredError', () => {
  it('should name every attribute that forces replacement', () => {
    const error = new ReplacementRequiredError('apig_signature_associate', ['instance_id', 'signature_id']);

    expect(error.message).toBe('apig_signature_associate: changing "instance_id", "signature_id" requires replacing the resource');
  });
});
