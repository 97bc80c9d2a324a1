import { z } from 'zod';
import { waitForOperation, longRunningStatus } from '../gcp/operations.js';
import { isNotFound } from '../lib/errors.js';
import { defineStep, projectIdSchema, regionSchema } from './define.js';

/** Public placeholder container used until a real image is configured */
export const PLACEHOLDER_IMAGE = 'us-docker.pkg.dev/cloudrun/container/hello';

export const deployAppArgs = z
  .object({
    project_id: projectIdSchema,
    region: regionSchema.default('us-central1'),
    service: z.string().regex(/^[a-z]([-a-z0-9]{0,47}[a-z0-9])?$/, 'must be a lowercase service name').default('app'),
    image: z.string().min(1).default(PLACEHOLDER_IMAGE),
    env: z.record(z.string()).default({}),
    port: z.number().int().min(1).max(65535).optional(),
  })
  .strict();

export const deployAppStep = defineStep({
  target: 'deploy_app',
  description: 'Deploy the application as a Cloud Run service',
  args: deployAppArgs,
  async run(args, ctx) {
    const { run } = ctx.clients;
    const spec = { image: args.image, env: args.env, port: args.port, labels: { 'managed-by': 'provision' } };

    let exists = true;
    try {
      await run.getService(args.project_id, args.region, args.service);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      exists = false;
    }

    ctx.log.info(`${exists ? 'Updating' : 'Creating'} service ${args.service} in ${args.region} (${args.image})`);
    const op = exists
      ? await run.updateService(args.project_id, args.region, args.service, spec)
      : await run.createService(args.project_id, args.region, args.service, spec);

    const opName = op.name;
    if (opName) {
      await waitForOperation(
        longRunningStatus(op),
        async () => longRunningStatus(await run.getOperation(opName)),
        { intervalMs: ctx.pollIntervalMs, description: `deploy ${args.service}` },
      );
    }

    const service = await run.getService(args.project_id, args.region, args.service);
    if (service.uri) {
      ctx.log.info(`Service URL: ${service.uri}`);
    }
    return { service: args.service, uri: service.uri ?? null };
  },
});
