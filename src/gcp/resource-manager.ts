import { z } from 'zod';
import { requestJson, type Transport } from './transport.js';
import { longRunningOperationSchema, type LongRunningOperation } from './operations.js';

const RESOURCE_MANAGER_URL = 'https://cloudresourcemanager.googleapis.com/v3';
const BILLING_URL = 'https://cloudbilling.googleapis.com/v1';

// ── IAM policy ──

export const bindingSchema = z.object({
  role: z.string(),
  members: z.array(z.string()).default([]),
  condition: z.record(z.unknown()).optional(),
});

export const policySchema = z.object({
  version: z.number().optional(),
  etag: z.string().optional(),
  bindings: z.array(bindingSchema).default([]),
});

export type IamBinding = z.infer<typeof bindingSchema>;
export type IamPolicy = z.infer<typeof policySchema>;

export interface CreateProjectRequest {
  projectId: string;
  displayName: string;
  parent?: string;
  labels: Record<string, string>;
}

/** Resource Manager v3: projects and project IAM policy */
export class ResourceManagerClient {
  constructor(private readonly transport: Transport) {}

  createProject(req: CreateProjectRequest): Promise<LongRunningOperation> {
    return requestJson(this.transport, longRunningOperationSchema, {
      method: 'POST',
      url: `${RESOURCE_MANAGER_URL}/projects`,
      body: {
        projectId: req.projectId,
        displayName: req.displayName,
        labels: req.labels,
        ...(req.parent ? { parent: req.parent } : {}),
      },
    });
  }

  getOperation(name: string): Promise<LongRunningOperation> {
    return requestJson(this.transport, longRunningOperationSchema, {
      method: 'GET',
      url: `${RESOURCE_MANAGER_URL}/${name}`,
    });
  }

  getIamPolicy(projectId: string): Promise<IamPolicy> {
    return requestJson(this.transport, policySchema, {
      method: 'POST',
      url: `${RESOURCE_MANAGER_URL}/projects/${projectId}:getIamPolicy`,
      body: {},
    });
  }

  setIamPolicy(projectId: string, policy: IamPolicy): Promise<IamPolicy> {
    return requestJson(this.transport, policySchema, {
      method: 'POST',
      url: `${RESOURCE_MANAGER_URL}/projects/${projectId}:setIamPolicy`,
      body: { policy },
    });
  }
}

const billingInfoSchema = z.object({
  billingAccountName: z.string().optional(),
  billingEnabled: z.boolean().optional(),
});

export type BillingInfo = z.infer<typeof billingInfoSchema>;

/** Cloud Billing: link a project to a billing account */
export class BillingClient {
  constructor(private readonly transport: Transport) {}

  getBillingInfo(projectId: string): Promise<BillingInfo> {
    return requestJson(this.transport, billingInfoSchema, {
      method: 'GET',
      url: `${BILLING_URL}/projects/${projectId}/billingInfo`,
    });
  }

  linkBillingAccount(projectId: string, billingAccount: string): Promise<BillingInfo> {
    const name = billingAccount.startsWith('billingAccounts/')
      ? billingAccount
      : `billingAccounts/${billingAccount}`;
    return requestJson(this.transport, billingInfoSchema, {
      method: 'PUT',
      url: `${BILLING_URL}/projects/${projectId}/billingInfo`,
      body: { billingAccountName: name },
    });
  }
}
