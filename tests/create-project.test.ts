import { describe, it, expect } from 'vitest';
import { FakeTransport, fakeContext, alreadyExists } from './helpers/fake-gcp.js';
import { createProjectStep, deriveProjectId } from '../src/steps/create-project.js';

const ARGS = { region: 'us', env: 'dev', app_postfix: 'demo', lob: 'ops' };
const PROJECT = 'prj-us-ops-demo-dev';

function resolveStep(args: unknown) {
  const resolved = createProjectStep.resolve(args);
  if (!resolved.ok) throw new Error(resolved.issues.join('\n'));
  return resolved;
}

describe('deriveProjectId', () => {
  it('follows the prj-<region>-<lob>-<app>-<env> convention', () => {
    expect(deriveProjectId(ARGS)).toBe(PROJECT);
  });

  it('prefers an explicit project_id', () => {
    expect(deriveProjectId({ ...ARGS, project_id: 'custom-project' })).toBe('custom-project');
  });
});

describe('createProjectStep', () => {
  it('creates the project and waits for the operation', async () => {
    const transport = new FakeTransport()
      .on('POST', '/v3/projects', { name: 'operations/cp.1', done: false })
      .on('GET', '/operations/cp.1', { done: false }, { done: true });
    const ctx = fakeContext(transport);

    await expect(resolveStep(ARGS).invoke(ctx)).resolves.toEqual({ projectId: PROJECT });

    expect(transport.calls[0]!.body).toEqual({
      projectId: PROJECT,
      displayName: 'ops-demo-dev',
      labels: { env: 'dev', lob: 'ops' },
    });
    expect(transport.callsTo('GET', '/operations/cp.1')).toHaveLength(2);
    expect(ctx.log.lines).toEqual([`info: Creating project ${PROJECT}`, `info: Created project ${PROJECT}`]);
  });

  it('passes parent, display name and extra labels', async () => {
    const transport = new FakeTransport().on('POST', '/v3/projects', { done: true });

    await resolveStep({
      ...ARGS,
      parent: 'folders/123456',
      display_name: 'Demo dev',
      labels: { team: 'platform' },
    }).invoke(fakeContext(transport));

    expect(transport.calls[0]!.body).toEqual({
      projectId: PROJECT,
      displayName: 'Demo dev',
      labels: { env: 'dev', lob: 'ops', team: 'platform' },
      parent: 'folders/123456',
    });
  });

  it('treats an existing project as success', async () => {
    const transport = new FakeTransport().on('POST', '/v3/projects', alreadyExists('project'));
    const ctx = fakeContext(transport);

    await expect(resolveStep(ARGS).invoke(ctx)).resolves.toEqual({ projectId: PROJECT });
    expect(ctx.log.lines).toEqual([`info: Creating project ${PROJECT}`, `info: Project already exists: ${PROJECT}`]);
  });

  it('links the billing account', async () => {
    const transport = new FakeTransport()
      .on('POST', '/v3/projects', { done: true })
      .on('GET', `/projects/${PROJECT}/billingInfo`, { billingEnabled: false })
      .on('PUT', `/projects/${PROJECT}/billingInfo`, { billingAccountName: 'billingAccounts/0A1B2C-3D4E5F-6A7B8C' });

    await resolveStep({ ...ARGS, billing_account: '0A1B2C-3D4E5F-6A7B8C' }).invoke(fakeContext(transport));

    const [link] = transport.callsTo('PUT', '/billingInfo');
    expect(link!.body).toEqual({ billingAccountName: 'billingAccounts/0A1B2C-3D4E5F-6A7B8C' });
  });

  it('leaves an already linked billing account alone', async () => {
    const transport = new FakeTransport()
      .on('POST', '/v3/projects', alreadyExists())
      .on('GET', `/projects/${PROJECT}/billingInfo`, { billingAccountName: 'billingAccounts/0A1B2C-3D4E5F-6A7B8C' });
    const ctx = fakeContext(transport);

    await resolveStep({ ...ARGS, billing_account: 'billingAccounts/0A1B2C-3D4E5F-6A7B8C' }).invoke(ctx);

    expect(transport.callsTo('PUT', '/billingInfo')).toHaveLength(0);
    expect(ctx.log.lines.at(-1)).toBe('info: Billing already linked to billingAccounts/0A1B2C-3D4E5F-6A7B8C');
  });

  it('rejects a derived id that breaks the project id rule', () => {
    expect(createProjectStep.resolve({ ...ARGS, lob: 'a-very-long-line-of-business' })).toEqual({
      ok: false,
      issues: [
        'args.project_id: derived project id "prj-us-a-very-long-line-of-business-demo-dev" is not a valid project id; set project_id explicitly',
      ],
    });
  });

  it('rejects unknown arguments', () => {
    const result = createProjectStep.resolve({ ...ARGS, zone: 'us-central1-a' });
    expect(result).toEqual({ ok: false, issues: ["args: Unrecognized key(s) in object: 'zone'"] });
  });
});
