import { deriveProjectId } from '../steps/create-project.js';

export interface DefaultPlanParams {
  region: string;
  env: string;
  app: string;
  lob: string;
  /** Region for regional resources (subnet, Cloud Run) */
  location: string;
}

/**
 * The standard environment: project, APIs, network, application.
 * Written to provision.yaml by `provision init`.
 */
export function buildDefaultPlan(params: DefaultPlanParams) {
  const projectId = deriveProjectId({
    region: params.region,
    lob: params.lob,
    app_postfix: params.app,
    env: params.env,
  });

  return {
    name: `${params.app}-${params.env}`,
    description: `${params.lob} ${params.app} (${params.env}) environment`,
    steps: [
      {
        name: 'create_project',
        args: {
          region: params.region,
          env: params.env,
          app_postfix: params.app,
          lob: params.lob,
        },
      },
      {
        name: 'enable_apis',
        args: { project_id: projectId },
      },
      {
        name: 'configure_network',
        args: {
          project_id: projectId,
          env_type: params.env,
          vpc_name: `${params.env}-shared-vpc`,
          subnets: [
            { name: `${params.env}-${params.location}`, region: params.location, ip_cidr_range: '10.10.0.0/24' },
          ],
        },
      },
      {
        name: 'deploy_app',
        args: { project_id: projectId, region: params.location, service: params.app },
      },
    ],
  };
}
