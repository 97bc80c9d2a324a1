import { StepRegistry } from './define.js';
import { createProjectStep } from './create-project.js';
import { enableApisStep } from './enable-apis.js';
import { configureNetworkStep } from './configure-network.js';
import { deployAppStep } from './deploy-app.js';
import { provisionServiceAccountStep } from './service-account.js';

/** Registry of every built-in step kind */
export function createStepRegistry(): StepRegistry {
  return new StepRegistry()
    .register(createProjectStep)
    .register(enableApisStep)
    .register(configureNetworkStep)
    .register(deployAppStep)
    .register(provisionServiceAccountStep);
}

export { defineStep, StepRegistry, type StepKind, type StepDefinition } from './define.js';
export { REQUIRED_APIS, enableApis, type EnableApisResult } from './enable-apis.js';
export { createServiceAccount, assignRoles, addMemberToPolicy, type BindingChange } from './service-account.js';
export { deriveProjectId } from './create-project.js';
