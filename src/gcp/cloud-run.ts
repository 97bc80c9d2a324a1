import { z } from 'zod';
import { requestJson, type Transport } from './transport.js';
import { longRunningOperationSchema, type LongRunningOperation } from './operations.js';

const BASE_URL = 'https://run.googleapis.com/v2';

const runServiceSchema = z.object({
  name: z.string(),
  uri: z.string().optional(),
});

export type RunService = z.infer<typeof runServiceSchema>;

export interface RunServiceSpec {
  image: string;
  env: Record<string, string>;
  port?: number;
  labels: Record<string, string>;
}

function serviceBody(spec: RunServiceSpec) {
  return {
    labels: spec.labels,
    template: {
      containers: [
        {
          image: spec.image,
          env: Object.entries(spec.env).map(([name, value]) => ({ name, value })),
          ...(spec.port ? { ports: [{ containerPort: spec.port }] } : {}),
        },
      ],
    },
  };
}

/** Cloud Run Admin API v2: services */
export class CloudRunClient {
  constructor(private readonly transport: Transport) {}

  private servicesUrl(projectId: string, region: string): string {
    return `${BASE_URL}/projects/${projectId}/locations/${region}/services`;
  }

  getService(projectId: string, region: string, service: string): Promise<RunService> {
    return requestJson(this.transport, runServiceSchema, {
      method: 'GET',
      url: `${this.servicesUrl(projectId, region)}/${service}`,
    });
  }

  createService(
    projectId: string,
    region: string,
    service: string,
    spec: RunServiceSpec,
  ): Promise<LongRunningOperation> {
    return requestJson(this.transport, longRunningOperationSchema, {
      method: 'POST',
      url: this.servicesUrl(projectId, region),
      query: { serviceId: service },
      body: serviceBody(spec),
    });
  }

  updateService(
    projectId: string,
    region: string,
    service: string,
    spec: RunServiceSpec,
  ): Promise<LongRunningOperation> {
    return requestJson(this.transport, longRunningOperationSchema, {
      method: 'PATCH',
      url: `${this.servicesUrl(projectId, region)}/${service}`,
      body: serviceBody(spec),
    });
  }

  getOperation(name: string): Promise<LongRunningOperation> {
    return requestJson(this.transport, longRunningOperationSchema, {
      method: 'GET',
      url: `${BASE_URL}/${name}`,
    });
  }
}
