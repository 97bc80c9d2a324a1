import { z } from 'zod';
import { requestJson, type Transport } from './transport.js';

const BASE_URL = 'https://iam.googleapis.com/v1';

const serviceAccountSchema = z.object({
  name: z.string().optional(),
  email: z.string(),
  displayName: z.string().optional(),
});

export type ServiceAccount = z.infer<typeof serviceAccountSchema>;

/** Email Google assigns to a user-managed service account */
export function serviceAccountEmail(projectId: string, accountId: string): string {
  return `${accountId}@${projectId}.iam.gserviceaccount.com`;
}

/** IAM API: service accounts */
export class IamClient {
  constructor(private readonly transport: Transport) {}

  createServiceAccount(
    projectId: string,
    accountId: string,
    displayName: string,
  ): Promise<ServiceAccount> {
    return requestJson(this.transport, serviceAccountSchema, {
      method: 'POST',
      url: `${BASE_URL}/projects/${projectId}/serviceAccounts`,
      body: { accountId, serviceAccount: { displayName } },
    });
  }
}
