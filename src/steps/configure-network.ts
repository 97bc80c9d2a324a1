import { z } from 'zod';
import { waitForOperation, computeStatus } from '../gcp/operations.js';
import { isAlreadyExists, isNotFound } from '../lib/errors.js';
import { defineStep, projectIdSchema, regionSchema } from './define.js';

const resourceName = z.string().regex(/^[a-z]([-a-z0-9]{0,61}[a-z0-9])?$/, 'must be a lowercase resource name');

const subnetSchema = z
  .object({
    name: resourceName,
    region: regionSchema,
    ip_cidr_range: z.string().regex(/^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}$/, 'must be a CIDR range such as 10.0.0.0/24'),
    private_google_access: z.boolean().default(true),
  })
  .strict();

export const configureNetworkArgs = z
  .object({
    project_id: projectIdSchema,
    env_type: z.string().min(1),
    vpc_name: resourceName,
    routing_mode: z.enum(['REGIONAL', 'GLOBAL']).default('REGIONAL'),
    subnets: z.array(subnetSchema).default([]),
  })
  .strict();

export const configureNetworkStep = defineStep({
  target: 'configure_network',
  description: 'Ensure the custom-mode VPC network and its subnets exist',
  args: configureNetworkArgs,
  async run(args, ctx) {
    const { compute } = ctx.clients;
    const project = args.project_id;

    // ── Network ──
    let networkExists = true;
    try {
      await compute.getNetwork(project, args.vpc_name);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      networkExists = false;
    }

    let createdNetwork = false;
    if (networkExists) {
      ctx.log.info(`Network already exists: ${args.vpc_name}`);
    } else {
      ctx.log.info(`Creating network ${args.vpc_name} (${args.routing_mode})`);
      try {
        const op = await compute.insertNetwork(project, {
          name: args.vpc_name,
          description: `${args.env_type} network`,
          routingMode: args.routing_mode,
        });
        await waitForOperation(
          computeStatus(op),
          async () => computeStatus(await compute.getGlobalOperation(project, op.name)),
          { intervalMs: ctx.pollIntervalMs, description: `create network ${args.vpc_name}` },
        );
        createdNetwork = true;
        ctx.log.info(`Created network ${args.vpc_name}`);
      } catch (err) {
        // Created by someone else since the lookup
        if (!isAlreadyExists(err)) throw err;
        ctx.log.info(`Network already exists: ${args.vpc_name}`);
      }
    }

    // ── Subnets ──
    const created: string[] = [];
    for (const subnet of args.subnets) {
      try {
        await compute.getSubnetwork(project, subnet.region, subnet.name);
        ctx.log.info(`Subnet already exists: ${subnet.region}/${subnet.name}`);
        continue;
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }

      ctx.log.info(`Creating subnet ${subnet.region}/${subnet.name} (${subnet.ip_cidr_range})`);
      try {
        const op = await compute.insertSubnetwork(project, {
          name: subnet.name,
          region: subnet.region,
          network: `projects/${project}/global/networks/${args.vpc_name}`,
          ipCidrRange: subnet.ip_cidr_range,
          privateIpGoogleAccess: subnet.private_google_access,
        });
        await waitForOperation(
          computeStatus(op),
          async () => computeStatus(await compute.getRegionOperation(project, subnet.region, op.name)),
          { intervalMs: ctx.pollIntervalMs, description: `create subnet ${subnet.name}` },
        );
        created.push(subnet.name);
      } catch (err) {
        if (!isAlreadyExists(err)) throw err;
        ctx.log.info(`Subnet already exists: ${subnet.region}/${subnet.name}`);
      }
    }

    return { network: args.vpc_name, createdNetwork, createdSubnets: created };
  },
});
