import { describe, it, expect } from 'vitest';
import { thrown } from './helpers/thrown.js';
import { resolvePlanFile, resolveRunConfig, parsePollInterval } from '../src/config.js';

const cwd = '/work';

describe('resolvePlanFile', () => {
  it('prefers the argument, then PROVISION_PLAN, then provision.yaml', () => {
    expect(resolvePlanFile('plans/uat.yaml', { PROVISION_PLAN: 'other.yaml' }, cwd)).toBe('/work/plans/uat.yaml');
    expect(resolvePlanFile(undefined, { PROVISION_PLAN: 'other.yaml' }, cwd)).toBe('/work/other.yaml');
    expect(resolvePlanFile(undefined, {}, cwd)).toBe('/work/provision.yaml');
  });
});

describe('parsePollInterval', () => {
  it('converts seconds to milliseconds', () => {
    expect(parsePollInterval('5')).toBe(5000);
    expect(parsePollInterval('0.25')).toBe(250);
    expect(parsePollInterval('0')).toBe(0);
  });

  it('defaults to two seconds', () => {
    expect(parsePollInterval(undefined)).toBe(2000);
    expect(parsePollInterval('')).toBe(2000);
  });

  it('rejects values that are not a non-negative number', () => {
    expect(thrown(() => parsePollInterval('soon'))).toMatchObject({ code: 'INVALID_CONFIG' });
    expect(thrown(() => parsePollInterval('-1'))).toMatchObject({ code: 'INVALID_CONFIG' });
  });
});

describe('resolveRunConfig', () => {
  const plan = { scope: 'plan-scope', state_file: 'state/plan.json' };

  it('uses built-in defaults without a plan or environment', () => {
    expect(resolveRunConfig(null, '/work/provision.yaml', {}, {}, cwd)).toEqual({
      planFile: '/work/provision.yaml',
      stateFile: '/work/orchestration_state.json',
      scope: undefined,
      pollIntervalMs: 2000,
      eventsPath: '/work/.provision/events.jsonl',
    });
  });

  it('takes plan settings over defaults', () => {
    const config = resolveRunConfig(plan, '/work/provision.yaml', {}, {}, cwd);
    expect(config.stateFile).toBe('/work/state/plan.json');
    expect(config.scope).toBe('plan-scope');
    expect(config.eventsPath).toBe('/work/state/.provision/events.jsonl');
  });

  it('takes the environment over the plan', () => {
    const env = { PROVISION_STATE_FILE: 'env.json', PROVISION_SCOPE: 'env-scope', PROVISION_POLL_INTERVAL: '3' };
    const config = resolveRunConfig(plan, '/work/provision.yaml', {}, env, cwd);
    expect(config.stateFile).toBe('/work/env.json');
    expect(config.scope).toBe('env-scope');
    expect(config.pollIntervalMs).toBe(3000);
  });

  it('takes CLI options over everything', () => {
    const env = { PROVISION_STATE_FILE: 'env.json', PROVISION_SCOPE: 'env-scope', PROVISION_POLL_INTERVAL: '3' };
    const config = resolveRunConfig(
      plan,
      '/work/provision.yaml',
      { state: '/tmp/cli.json', scope: 'cli-scope', pollInterval: '1' },
      env,
      cwd,
    );
    expect(config.stateFile).toBe('/tmp/cli.json');
    expect(config.scope).toBe('cli-scope');
    expect(config.pollIntervalMs).toBe(1000);
    expect(config.eventsPath).toBe('/tmp/.provision/events.jsonl');
  });

  it('ignores empty environment values', () => {
    const config = resolveRunConfig(null, '/work/provision.yaml', {}, { PROVISION_SCOPE: '', PROVISION_STATE_FILE: '' }, cwd);
    expect(config.scope).toBeUndefined();
    expect(config.stateFile).toBe('/work/orchestration_state.json');
  });
});
