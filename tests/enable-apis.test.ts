import { describe, it, expect } from 'vitest';
import { FakeTransport, fakeContext } from './helpers/fake-gcp.js';
import { enableApis, enableApisStep, REQUIRED_APIS } from '../src/steps/enable-apis.js';
import { GcpApiError } from '../src/lib/errors.js';

const PROJECT = 'prj-us-ops-demo-dev';

function invoke(transport: FakeTransport, args: unknown) {
  const resolved = enableApisStep.resolve(args);
  if (!resolved.ok) throw new Error(resolved.issues.join('\n'));
  const ctx = fakeContext(transport);
  return { ctx, result: resolved.invoke(ctx) };
}

describe('enableApis', () => {
  it('keeps going after one API fails and the step still succeeds', async () => {
    const transport = new FakeTransport()
      .on('GET', '/services/x.googleapis.com', new GcpApiError(403, 'permission denied'))
      .on('GET', '/services/y.googleapis.com', { state: 'DISABLED' })
      .on('POST', '/services/y.googleapis.com:enable', { name: 'operations/acf.1', done: false })
      .on('GET', '/operations/acf.1', { name: 'operations/acf.1', done: true });

    const { ctx, result } = invoke(transport, { project_id: PROJECT, apis: ['x.googleapis.com', 'y.googleapis.com'] });

    await expect(result).resolves.toEqual({
      enabled: ['y.googleapis.com'],
      skipped: [],
      failed: [{ api: 'x.googleapis.com', error: 'permission denied' }],
    });
    expect(ctx.log.lines).toEqual([
      'error: Error with enabling API x.googleapis.com: permission denied',
      'info: Enabling API: y.googleapis.com',
      'info: Successfully enabled: y.googleapis.com',
      'warn: 1 of 2 API(s) could not be enabled: x.googleapis.com',
    ]);
  });

  it('skips APIs that are already enabled', async () => {
    const transport = new FakeTransport().on('GET', '/services/run.googleapis.com', { state: 'ENABLED' });
    const ctx = fakeContext(transport);

    const result = await enableApis(ctx.clients, PROJECT, ['run.googleapis.com'], ctx);

    expect(result).toEqual({ enabled: [], skipped: ['run.googleapis.com'], failed: [] });
    expect(transport.callsTo('POST', '/services/run.googleapis.com:enable')).toHaveLength(0);
    expect(ctx.log.lines).toEqual(['info: Already enabled: run.googleapis.com']);
  });

  it('polls the enable operation until it is done', async () => {
    const transport = new FakeTransport()
      .on('GET', '/services/run.googleapis.com', { state: 'DISABLED' })
      .on('POST', '/services/run.googleapis.com:enable', { name: 'operations/acf.2' })
      .on('GET', '/operations/acf.2', { done: false }, { done: false }, { done: true });
    const ctx = fakeContext(transport);

    const result = await enableApis(ctx.clients, PROJECT, ['run.googleapis.com'], ctx);

    expect(result.enabled).toEqual(['run.googleapis.com']);
    expect(transport.callsTo('GET', '/operations/acf.2')).toHaveLength(3);
    expect(transport.callsTo('POST', '/services/run.googleapis.com:enable')[0]).toEqual({
      method: 'POST',
      url: `https://serviceusage.googleapis.com/v1/projects/${PROJECT}/services/run.googleapis.com:enable`,
      body: {},
    });
  });

  it('does not poll an operation returned already done', async () => {
    const transport = new FakeTransport()
      .on('GET', '/services/iam.googleapis.com', { state: 'STATE_UNSPECIFIED' })
      .on('POST', '/services/iam.googleapis.com:enable', { done: true });
    const ctx = fakeContext(transport);

    const result = await enableApis(ctx.clients, PROJECT, ['iam.googleapis.com'], ctx);

    expect(result.enabled).toEqual(['iam.googleapis.com']);
    expect(transport.calls).toHaveLength(2);
  });

  it('records a failed enable operation against that API only', async () => {
    const transport = new FakeTransport()
      .on('GET', '/services/dns.googleapis.com', { state: 'DISABLED' })
      .on('POST', '/services/dns.googleapis.com:enable', { name: 'operations/acf.3' })
      .on('GET', '/operations/acf.3', { done: true, error: { code: 9, message: 'billing disabled' } });
    const ctx = fakeContext(transport);

    const result = await enableApis(ctx.clients, PROJECT, ['dns.googleapis.com'], ctx);

    expect(result.failed).toEqual([{ api: 'dns.googleapis.com', error: 'enable dns.googleapis.com failed: billing disabled' }]);
  });

  it('defaults to the required API list', async () => {
    const transport = new FakeTransport().handle('GET', '.googleapis.com', () => ({ state: 'ENABLED' }));
    const { result } = invoke(transport, { project_id: PROJECT });

    await expect(result).resolves.toMatchObject({ skipped: REQUIRED_APIS });
    expect(transport.calls).toHaveLength(REQUIRED_APIS.length);
  });
});

describe('enableApisStep arguments', () => {
  it('rejects a malformed service name', () => {
    expect(enableApisStep.resolve({ project_id: PROJECT, apis: ['run'] })).toEqual({
      ok: false,
      issues: ['args.apis.0: must be a service name such as run.googleapis.com'],
    });
  });

  it('rejects an empty API list', () => {
    const result = enableApisStep.resolve({ project_id: PROJECT, apis: [] });
    expect(result.ok).toBe(false);
  });
});
