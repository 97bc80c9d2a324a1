import { z } from 'zod';
import { waitForOperation, longRunningStatus } from '../gcp/operations.js';
import { isAlreadyExists } from '../lib/errors.js';
import { defineStep, projectIdSchema } from './define.js';

const PROJECT_ID_PATTERN = /^[a-z][a-z0-9-]{4,28}[a-z0-9]$/;
const segment = z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lowercase letters, digits or hyphens');

const createProjectFields = z
  .object({
    project_id: projectIdSchema.optional(),
    region: segment,
    env: segment,
    app_postfix: segment,
    lob: segment,
    parent: z
      .string()
      .regex(/^(folders|organizations)\/\d+$/, 'must be folders/<id> or organizations/<id>')
      .optional(),
    display_name: z.string().min(4).max(30).optional(),
    billing_account: z
      .string()
      .regex(/^(billingAccounts\/)?[A-F0-9]{6}-[A-F0-9]{6}-[A-F0-9]{6}$/, 'must be a billing account id such as 0X0X0X-0X0X0X-0X0X0X')
      .optional(),
    labels: z.record(z.string()).default({}),
  })
  .strict();

export type CreateProjectArgs = z.infer<typeof createProjectFields>;

/** Naming convention: prj-<region>-<lob>-<app>-<env> */
export function deriveProjectId(args: Pick<CreateProjectArgs, 'project_id' | 'region' | 'lob' | 'app_postfix' | 'env'>): string {
  return args.project_id ?? `prj-${args.region}-${args.lob}-${args.app_postfix}-${args.env}`;
}

export const createProjectArgs = createProjectFields.superRefine((args, ctx) => {
  const id = deriveProjectId(args);
  if (!PROJECT_ID_PATTERN.test(id)) {
    ctx.addIssue({
      code: 'custom',
      path: ['project_id'],
      message: `derived project id "${id}" is not a valid project id; set project_id explicitly`,
    });
  }
});

export const createProjectStep = defineStep({
  target: 'create_project',
  description: 'Create the project and link billing',
  args: createProjectArgs,
  async run(args, ctx) {
    const { resourceManager, billing } = ctx.clients;
    const projectId = deriveProjectId(args);

    try {
      ctx.log.info(`Creating project ${projectId}`);
      const op = await resourceManager.createProject({
        projectId,
        displayName: args.display_name ?? `${args.lob}-${args.app_postfix}-${args.env}`.slice(0, 30),
        parent: args.parent,
        labels: { env: args.env, lob: args.lob, ...args.labels },
      });
      const opName = op.name;
      if (opName) {
        await waitForOperation(
          longRunningStatus(op),
          async () => longRunningStatus(await resourceManager.getOperation(opName)),
          { intervalMs: ctx.pollIntervalMs, description: `create project ${projectId}` },
        );
      }
      ctx.log.info(`Created project ${projectId}`);
    } catch (err) {
      if (!isAlreadyExists(err)) throw err;
      ctx.log.info(`Project already exists: ${projectId}`);
    }

    if (args.billing_account) {
      const account = args.billing_account.startsWith('billingAccounts/')
        ? args.billing_account
        : `billingAccounts/${args.billing_account}`;
      const info = await billing.getBillingInfo(projectId);
      if (info.billingAccountName === account) {
        ctx.log.info(`Billing already linked to ${account}`);
      } else {
        await billing.linkBillingAccount(projectId, account);
        ctx.log.info(`Linked billing account ${account}`);
      }
    }

    return { projectId };
  },
});
