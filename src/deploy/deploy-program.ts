// Deploy program — validates the configuration, then hands it to the
// Deployer. Any failure is fatal to the run.

import { Effect } from "effect";
import {
  validateDeploymentConfig,
  type DeploymentConfig,
} from "./deployment-config.js";
import { Deployer, type DeployError, type DeployResult } from "./deployer.js";

export function deployService(
  config: DeploymentConfig,
): Effect.Effect<DeployResult, DeployError, Deployer> {
  return Effect.gen(function* () {
    const deployer = yield* Deployer;
    const valid = yield* validateDeploymentConfig(config);
    const result = yield* deployer.deploy(valid);
    yield* Effect.logInfo(
      `deployment ${result.deploymentName} ready in ${result.namespace}`,
    );
    return result;
  }).pipe(
    Effect.tapError((e) => Effect.logError(`deployment failed: ${e._tag}`)),
  );
}

export function teardownService(
  namespace: string,
): Effect.Effect<void, DeployError, Deployer> {
  return Effect.gen(function* () {
    const deployer = yield* Deployer;
    yield* deployer.teardown(namespace);
    yield* Effect.logInfo(`namespace ${namespace} deleted`);
  });
}
