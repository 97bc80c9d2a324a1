import { z } from 'zod';
import { requestJson, type Transport } from './transport.js';
import { longRunningOperationSchema, type LongRunningOperation } from './operations.js';

const BASE_URL = 'https://serviceusage.googleapis.com/v1';

const serviceSchema = z.object({
  name: z.string().optional(),
  state: z.enum(['STATE_UNSPECIFIED', 'DISABLED', 'ENABLED']).default('STATE_UNSPECIFIED'),
  config: z.object({ name: z.string().optional(), title: z.string().optional() }).optional(),
});

const serviceListSchema = z.object({
  services: z.array(serviceSchema).default([]),
  nextPageToken: z.string().optional(),
});

export type ServiceState = z.infer<typeof serviceSchema>['state'];

export interface EnabledService {
  api: string;
  title: string | null;
}

/** Service Usage API: query and enable project APIs */
export class ServiceUsageClient {
  constructor(private readonly transport: Transport) {}

  async getState(projectId: string, api: string): Promise<ServiceState> {
    const service = await requestJson(this.transport, serviceSchema, {
      method: 'GET',
      url: `${BASE_URL}/projects/${projectId}/services/${api}`,
    });
    return service.state;
  }

  enable(projectId: string, api: string): Promise<LongRunningOperation> {
    return requestJson(this.transport, longRunningOperationSchema, {
      method: 'POST',
      url: `${BASE_URL}/projects/${projectId}/services/${api}:enable`,
      body: {},
    });
  }

  getOperation(name: string): Promise<LongRunningOperation> {
    return requestJson(this.transport, longRunningOperationSchema, {
      method: 'GET',
      url: `${BASE_URL}/${name}`,
    });
  }

  /** All enabled services, following pagination */
  async listEnabled(projectId: string): Promise<EnabledService[]> {
    const result: EnabledService[] = [];
    let pageToken: string | undefined;

    do {
      const query: Record<string, string> = { filter: 'state:ENABLED', pageSize: '200' };
      if (pageToken) query.pageToken = pageToken;

      const page = await requestJson(this.transport, serviceListSchema, {
        method: 'GET',
        url: `${BASE_URL}/projects/${projectId}/services`,
        query,
      });

      for (const svc of page.services) {
        const api = svc.config?.name ?? svc.name?.split('/').pop();
        if (api) result.push({ api, title: svc.config?.title ?? null });
      }
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    return result;
  }
}
