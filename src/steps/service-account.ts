import { z } from 'zod';
import type { GcpClients, IamPolicy } from '../gcp/index.js';
import { serviceAccountEmail } from '../gcp/iam.js';
import { isAlreadyExists } from '../lib/errors.js';
import type { StepLogger } from '../lib/utils/logger.js';
import { defineStep, projectIdSchema } from './define.js';

export const provisionServiceAccountArgs = z
  .object({
    project_id: projectIdSchema,
    account_id: z
      .string()
      .regex(/^[a-z][a-z0-9-]{4,28}[a-z0-9]$/, 'must be 6-30 lowercase letters, digits or hyphens'),
    display_name: z.string().min(1).max(100).optional(),
    /** Project whose policy receives the bindings; defaults to project_id */
    target_project_id: projectIdSchema.optional(),
    roles: z
      .array(z.string().regex(/^(roles|projects\/[^/]+\/roles|organizations\/\d+\/roles)\/[\w.]+$/, 'must be a role such as roles/viewer'))
      .default([]),
  })
  .strict();

/** Create a service account; an existing one with the same id counts as success */
export async function createServiceAccount(
  clients: GcpClients,
  projectId: string,
  accountId: string,
  displayName: string,
  log: StepLogger,
): Promise<string> {
  const email = serviceAccountEmail(projectId, accountId);

  try {
    const created = await clients.iam.createServiceAccount(projectId, accountId, displayName);
    log.info(`Created service account: ${created.email}`);
    return created.email;
  } catch (err) {
    if (!isAlreadyExists(err)) throw err;
    log.info(`Service account already exists: ${email}`);
    return email;
  }
}

export type BindingChange = 'added-binding' | 'added-member' | 'unchanged';

/**
 * Ensure the unconditional binding for `role` includes `member`.
 * Mutates the policy and reports what changed.
 */
export function addMemberToPolicy(policy: IamPolicy, role: string, member: string): BindingChange {
  const binding = policy.bindings.find((b) => b.role === role && !b.condition);

  if (!binding) {
    policy.bindings.push({ role, members: [member] });
    return 'added-binding';
  }
  if (binding.members.includes(member)) {
    return 'unchanged';
  }
  binding.members.push(member);
  return 'added-member';
}

/**
 * Bind the service account to each role on the target project.
 * One read-modify-write of the policy per role; an already-bound role issues no update.
 */
export async function assignRoles(
  clients: GcpClients,
  email: string,
  targetProjectId: string,
  roles: readonly string[],
  log: StepLogger,
): Promise<Record<string, BindingChange>> {
  const member = `serviceAccount:${email}`;
  const changes: Record<string, BindingChange> = {};

  for (const role of roles) {
    const policy = await clients.resourceManager.getIamPolicy(targetProjectId);
    const change = addMemberToPolicy(policy, role, member);
    changes[role] = change;

    if (change === 'unchanged') {
      log.info(`Role '${role}' already granted to ${email} in project ${targetProjectId}`);
      continue;
    }

    await clients.resourceManager.setIamPolicy(targetProjectId, policy);
    log.info(`Assigned role '${role}' to ${email} in project ${targetProjectId}`);
  }

  return changes;
}

export const provisionServiceAccountStep = defineStep({
  target: 'provision_service_account',
  description: 'Create a service account and grant it project roles',
  args: provisionServiceAccountArgs,
  async run(args, ctx) {
    const email = await createServiceAccount(
      ctx.clients,
      args.project_id,
      args.account_id,
      args.display_name ?? `${args.account_id} service account`,
      ctx.log,
    );
    const roles = await assignRoles(
      ctx.clients,
      email,
      args.target_project_id ?? args.project_id,
      args.roles,
      ctx.log,
    );
    return { email, roles };
  },
});
