import { createGoogleTransport, type Transport } from './transport.js';
import { ServiceUsageClient } from './service-usage.js';
import { ResourceManagerClient, BillingClient } from './resource-manager.js';
import { IamClient } from './iam.js';
import { ComputeClient } from './compute.js';
import { CloudRunClient } from './cloud-run.js';

/** Control-plane clients handed to every step */
export interface GcpClients {
  serviceUsage: ServiceUsageClient;
  resourceManager: ResourceManagerClient;
  billing: BillingClient;
  iam: IamClient;
  compute: ComputeClient;
  run: CloudRunClient;
}

export function createGcpClients(transport: Transport = createGoogleTransport()): GcpClients {
  return {
    serviceUsage: new ServiceUsageClient(transport),
    resourceManager: new ResourceManagerClient(transport),
    billing: new BillingClient(transport),
    iam: new IamClient(transport),
    compute: new ComputeClient(transport),
    run: new CloudRunClient(transport),
  };
}

export { createGoogleTransport, requestJson, toGcpApiError } from './transport.js';
export type { Transport, HttpRequest, HttpMethod } from './transport.js';
export { waitForOperation, sleep, DEFAULT_POLL_INTERVAL_MS } from './operations.js';
export { serviceAccountEmail } from './iam.js';
export type { IamPolicy, IamBinding } from './resource-manager.js';
