import { describe, it, expect, vi, beforeEach } from 'vitest';
import { join } from 'node:path';
import { writeFileSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { testContext } from './helpers/test-context.js';
import { thrown } from './helpers/thrown.js';
import { resetCheckpoint } from '../src/commands/reset/index.js';
import { buildStatusRows } from '../src/commands/status/index.js';
import { renderDefaultPlan } from '../src/commands/init/index.js';
import { loadRunContext, loadOptionalPlan } from '../src/commands/context.js';
import { withErrorHandler } from '../src/lib/command/with-error-handler.js';
import { debug } from '../src/lib/utils/debug.js';
import { ProvisionError, ErrorCode } from '../src/lib/errors.js';
import { FileCheckpointStore, ScopedCheckpointStore } from '../src/plan/state.js';
import { parsePlanYaml } from '../src/plan/parser.js';

const ctx = testContext();
const minimalPlan = fileURLToPath(new URL('../fixtures/minimal.yaml', import.meta.url));

class ExitCalled extends Error {
  constructor(readonly code: number | string | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

function writePlan(dir: string, steps: string[]): string {
  const path = join(dir, 'provision.yaml');
  writeFileSync(path, YAML.stringify({ name: 'test-plan', steps: steps.map((name) => ({ name })) }));
  return path;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

// ── reset ──

describe('resetCheckpoint', () => {
  it('requires a step name or --all', () => {
    expect(thrown(() => resetCheckpoint(undefined, {}))).toMatchObject({ code: 'MISSING_ARGUMENT' });
  });

  it('removes one step from the flat checkpoint', () => {
    const dir = ctx.createTempDir();
    const state = join(dir, 'state.json');
    new FileCheckpointStore(state).save({ completed: ['a', 'b', 'c'] });

    const result = resetCheckpoint('b', { plan: writePlan(dir, ['a', 'b', 'c']), state });

    expect(result).toEqual({ scope: 'global', removed: ['b'] });
    expect(new FileCheckpointStore(state).load()).toEqual({ completed: ['a', 'c'] });
  });

  it('resets every step of one scope', () => {
    const dir = ctx.createTempDir();
    const state = join(dir, 'state.json');
    new ScopedCheckpointStore(state, 'uat').save({ completed: ['a', 'b'] });
    new ScopedCheckpointStore(state, 'prod').save({ completed: ['a'] });

    const result = resetCheckpoint(undefined, { all: true, plan: writePlan(dir, ['a', 'b']), state, scope: 'uat' });

    expect(result).toEqual({ scope: 'uat', removed: ['a', 'b'] });
    expect(JSON.parse(readFileSync(state, 'utf-8'))).toEqual({
      uat: { completed: [] },
      prod: { completed: ['a'] },
    });
  });

  it('rejects a step the plan does not define', () => {
    const dir = ctx.createTempDir();
    const err = thrown(() => resetCheckpoint('deploy', { plan: writePlan(dir, ['a']), state: join(dir, 's.json') }));
    expect(err).toMatchObject({ code: 'STEP_NOT_FOUND', message: 'Plan "test-plan" has no step "deploy"', hint: 'Steps: a' });
  });

  it('reports a missing explicit plan', () => {
    const dir = ctx.createTempDir();
    expect(thrown(() => resetCheckpoint('a', { plan: join(dir, 'absent.yaml') }))).toMatchObject({
      code: 'PLAN_NOT_FOUND',
    });
  });
});

// ── status ──

describe('buildStatusRows', () => {
  it('lists plan steps in order with their state', () => {
    const plan = parsePlanYaml('name: p\nsteps:\n  - name: a\n  - name: b\n    target: enable_apis\n');
    expect(buildStatusRows(plan, { completed: ['a'] })).toEqual([
      { name: 'a', target: 'a', done: true },
      { name: 'b', target: 'enable_apis', done: false },
    ]);
  });

  it('keeps completed names the plan no longer lists', () => {
    const plan = parsePlanYaml('name: p\nsteps:\n  - name: a\n');
    expect(buildStatusRows(plan, { completed: ['old', 'a'] })).toEqual([
      { name: 'a', target: 'a', done: true },
      { name: 'old', target: null, done: true },
    ]);
    expect(buildStatusRows(null, { completed: ['x'] })).toEqual([{ name: 'x', target: null, done: true }]);
  });
});

// ── init ──

describe('renderDefaultPlan', () => {
  it('renders the standard four steps', () => {
    const content = renderDefaultPlan({ region: 'us', env: 'uat', app: 'demo', lob: 'ops', location: 'us-central1' });
    const plan = parsePlanYaml(content, {});

    expect(plan.name).toBe('demo-uat');
    expect(plan.steps.map((s) => s.name)).toEqual(['create_project', 'enable_apis', 'configure_network', 'deploy_app']);
    expect(plan.steps[1]!.args).toEqual({ project_id: 'prj-us-ops-demo-uat' });
    expect(plan.steps[2]!.args).toEqual({
      project_id: 'prj-us-ops-demo-uat',
      env_type: 'uat',
      vpc_name: 'uat-shared-vpc',
      subnets: [{ name: 'uat-us-central1', region: 'us-central1', ip_cidr_range: '10.10.0.0/24' }],
    });
    expect(plan.steps[3]!.args).toEqual({ project_id: 'prj-us-ops-demo-uat', region: 'us-central1', service: 'demo' });
  });

  it('refuses parameters that produce an invalid project id', () => {
    const err = thrown(() =>
      renderDefaultPlan({ region: 'us', env: 'dev', app: 'an-application-name-far-too-long', lob: 'ops', location: 'us-central1' }),
    );
    expect(err).toMatchObject({ code: 'PLAN_VALIDATION_ERROR' });
  });
});

// ── run context ──

describe('loadRunContext', () => {
  it('resolves the plan, config and checkpoint', () => {
    const dir = ctx.createTempDir();
    const state = join(dir, 'state.json');

    const run = loadRunContext(minimalPlan, { state, pollInterval: '0' });

    expect(run.plan.name).toBe('minimal');
    expect(run.steps.map((s) => s.target)).toEqual(['enable_apis']);
    expect(run.config.pollIntervalMs).toBe(0);
    expect(run.store).toBeInstanceOf(FileCheckpointStore);
    expect(run.store.path).toBe(state);
  });

  it('selects the scoped store when a scope is given', () => {
    const dir = ctx.createTempDir();
    const run = loadRunContext(minimalPlan, { state: join(dir, 'state.json'), scope: 'uat' });
    expect(run.store).toBeInstanceOf(ScopedCheckpointStore);
    expect(run.store.scope).toBe('uat');
  });
});

describe('loadOptionalPlan', () => {
  it('returns no plan when the default file is absent', () => {
    vi.stubEnv('PROVISION_PLAN', join(ctx.createTempDir(), 'provision.yaml'));
    expect(loadOptionalPlan(undefined).plan).toBeNull();
  });
});

// ── withErrorHandler ──

describe('withErrorHandler', () => {
  function mockExit() {
    return vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new ExitCalled(code);
    });
  }

  it('exits 3 for validation errors and prints the hint', async () => {
    mockExit();
    const handler = withErrorHandler(async () => {
      throw new ProvisionError(ErrorCode.PLAN_NOT_FOUND, 'plan not found: x.yaml', 'Run: provision init');
    });

    await expect(handler()).rejects.toMatchObject({ code: 3 });
    const lines = vi.mocked(console.error).mock.calls.map((c) => String(c[0]));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('✗ plan not found: x.yaml');
    expect(lines[1]).toContain('Run: provision init');
  });

  it('exits 1 for operational errors', async () => {
    mockExit();
    const handler = withErrorHandler(async () => {
      throw new ProvisionError(ErrorCode.STATE_WRITE_FAILED, 'disk full');
    });
    await expect(handler()).rejects.toMatchObject({ code: 1 });
  });

  it('exits 1 for unexpected errors', async () => {
    mockExit();
    const handler = withErrorHandler(async () => {
      throw new Error('boom');
    });
    await expect(handler()).rejects.toMatchObject({ code: 1 });
    expect(String(vi.mocked(console.error).mock.calls[0]![0])).toContain('✗ boom');
  });

  it('passes through when the handler succeeds', async () => {
    const exit = mockExit();
    await withErrorHandler(async () => {})();
    expect(exit).not.toHaveBeenCalled();
  });
});

// ── debug ──

describe('debug', () => {
  it('is silent without PROVISION_DEBUG', () => {
    vi.stubEnv('PROVISION_DEBUG', '');
    debug('runner', 'hello');
    expect(console.error).not.toHaveBeenCalled();
  });

  it('filters by namespace prefix', () => {
    vi.stubEnv('PROVISION_DEBUG', 'gcp*');
    debug('gcp:http', 'GET');
    debug('runner', 'ignored');
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error).mock.calls[0]![1]).toBe('GET');
  });
});
