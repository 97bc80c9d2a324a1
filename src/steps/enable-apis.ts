import { z } from 'zod';
import type { GcpClients } from '../gcp/index.js';
import { waitForOperation, longRunningStatus } from '../gcp/operations.js';
import { errorMessage } from '../lib/errors.js';
import type { StepLogger } from '../lib/utils/logger.js';
import { defineStep, projectIdSchema } from './define.js';

/** APIs enabled when a step does not list its own */
export const REQUIRED_APIS = [
  'certificatemanager.googleapis.com',
  'cloudresourcemanager.googleapis.com',
  'iam.googleapis.com',
  'iamcredentials.googleapis.com',
  'sts.googleapis.com',
  'serviceusage.googleapis.com',
  'cloudbilling.googleapis.com',
  'compute.googleapis.com',
  'dns.googleapis.com',
  'logging.googleapis.com',
  'monitoring.googleapis.com',
  'cloudkms.googleapis.com',
  'orgpolicy.googleapis.com',
  'servicenetworking.googleapis.com',
  'artifactregistry.googleapis.com',
  'run.googleapis.com',
  'storage.googleapis.com',
  'sqladmin.googleapis.com',
  'aiplatform.googleapis.com',
  'bigquery.googleapis.com',
  'cloudbuild.googleapis.com',
  'pubsub.googleapis.com',
  'spanner.googleapis.com',
  'secretmanager.googleapis.com',
  'vpcaccess.googleapis.com',
  'networkservices.googleapis.com',
  'eventarc.googleapis.com',
  'notebooks.googleapis.com',
];

const apiName = z.string().regex(/^[a-z0-9.-]+\.googleapis\.com$/, 'must be a service name such as run.googleapis.com');

export const enableApisArgs = z
  .object({
    project_id: projectIdSchema,
    apis: z.array(apiName).min(1).optional(),
  })
  .strict();

export interface EnableApisResult {
  enabled: string[];
  skipped: string[];
  failed: Array<{ api: string; error: string }>;
}

export interface EnableApisOptions {
  log: StepLogger;
  pollIntervalMs: number;
}

/**
 * Enable each API that is not already enabled, waiting for every enable
 * operation. A failure on one API is logged and the loop moves on.
 */
export async function enableApis(
  clients: GcpClients,
  projectId: string,
  apis: readonly string[],
  options: EnableApisOptions,
): Promise<EnableApisResult> {
  const { log } = options;
  const result: EnableApisResult = { enabled: [], skipped: [], failed: [] };

  for (const api of apis) {
    try {
      const state = await clients.serviceUsage.getState(projectId, api);
      if (state === 'ENABLED') {
        log.info(`Already enabled: ${api}`);
        result.skipped.push(api);
        continue;
      }

      log.info(`Enabling API: ${api}`);
      const op = await clients.serviceUsage.enable(projectId, api);
      const opName = op.name;
      if (opName) {
        await waitForOperation(
          longRunningStatus(op),
          async () => longRunningStatus(await clients.serviceUsage.getOperation(opName)),
          { intervalMs: options.pollIntervalMs, description: `enable ${api}` },
        );
      }

      log.info(`Successfully enabled: ${api}`);
      result.enabled.push(api);
    } catch (err) {
      log.error(`Error with enabling API ${api}: ${errorMessage(err)}`);
      result.failed.push({ api, error: errorMessage(err) });
    }
  }

  if (result.failed.length > 0) {
    log.warn(`${result.failed.length} of ${apis.length} API(s) could not be enabled: ${result.failed.map((f) => f.api).join(', ')}`);
  }

  return result;
}

export const enableApisStep = defineStep({
  target: 'enable_apis',
  description: 'Enable control-plane APIs on a project',
  args: enableApisArgs,
  run: (args, ctx) =>
    enableApis(ctx.clients, args.project_id, args.apis ?? REQUIRED_APIS, {
      log: ctx.log,
      pollIntervalMs: ctx.pollIntervalMs,
    }),
});
