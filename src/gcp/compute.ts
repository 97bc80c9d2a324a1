import { z } from 'zod';
import { requestJson, type Transport } from './transport.js';
import { computeOperationSchema, type ComputeOperation } from './operations.js';

const BASE_URL = 'https://compute.googleapis.com/compute/v1';

const networkSchema = z.object({
  name: z.string(),
  selfLink: z.string().optional(),
  autoCreateSubnetworks: z.boolean().optional(),
});

const subnetworkSchema = z.object({
  name: z.string(),
  ipCidrRange: z.string().optional(),
  region: z.string().optional(),
});

export type Network = z.infer<typeof networkSchema>;
export type Subnetwork = z.infer<typeof subnetworkSchema>;

export interface InsertNetworkRequest {
  name: string;
  description: string;
  routingMode: 'REGIONAL' | 'GLOBAL';
}

export interface InsertSubnetworkRequest {
  name: string;
  region: string;
  network: string;
  ipCidrRange: string;
  privateIpGoogleAccess: boolean;
}

/** Compute Engine: VPC networks and subnetworks */
export class ComputeClient {
  constructor(private readonly transport: Transport) {}

  getNetwork(projectId: string, name: string): Promise<Network> {
    return requestJson(this.transport, networkSchema, {
      method: 'GET',
      url: `${BASE_URL}/projects/${projectId}/global/networks/${name}`,
    });
  }

  insertNetwork(projectId: string, req: InsertNetworkRequest): Promise<ComputeOperation> {
    return requestJson(this.transport, computeOperationSchema, {
      method: 'POST',
      url: `${BASE_URL}/projects/${projectId}/global/networks`,
      body: {
        name: req.name,
        description: req.description,
        autoCreateSubnetworks: false,
        routingConfig: { routingMode: req.routingMode },
      },
    });
  }

  getGlobalOperation(projectId: string, name: string): Promise<ComputeOperation> {
    return requestJson(this.transport, computeOperationSchema, {
      method: 'GET',
      url: `${BASE_URL}/projects/${projectId}/global/operations/${name}`,
    });
  }

  getSubnetwork(projectId: string, region: string, name: string): Promise<Subnetwork> {
    return requestJson(this.transport, subnetworkSchema, {
      method: 'GET',
      url: `${BASE_URL}/projects/${projectId}/regions/${region}/subnetworks/${name}`,
    });
  }

  insertSubnetwork(projectId: string, req: InsertSubnetworkRequest): Promise<ComputeOperation> {
    return requestJson(this.transport, computeOperationSchema, {
      method: 'POST',
      url: `${BASE_URL}/projects/${projectId}/regions/${req.region}/subnetworks`,
      body: {
        name: req.name,
        network: req.network,
        ipCidrRange: req.ipCidrRange,
        privateIpGoogleAccess: req.privateIpGoogleAccess,
      },
    });
  }

  getRegionOperation(projectId: string, region: string, name: string): Promise<ComputeOperation> {
    return requestJson(this.transport, computeOperationSchema, {
      method: 'GET',
      url: `${BASE_URL}/projects/${projectId}/regions/${region}/operations/${name}`,
    });
  }
}
