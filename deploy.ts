#!/usr/bin/env node
import { Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Console, Effect, Option } from "effect";
import {
  DeployEnvironment,
  makeDeploymentConfig,
  validateDeploymentConfig,
} from "./src/deploy/deployment-config.js";
import { deployService, teardownService } from "./src/deploy/deploy-program.js";
import type { DeployError } from "./src/deploy/deployer.js";
import {
  currentGitTag,
  DockerKubectlDeployerLive,
} from "./src/deploy/docker-kubectl-deployer.js";
import { manifestList } from "./src/deploy/manifests.js";
import {
  formatDeployError,
  formatDeployPlan,
  formatDeployResult,
  formatWarning,
} from "./src/format.js";

// --- CLI ---
// Environment: DOCKER_REGISTRY, REGISTRY_NAMESPACE, K8S_NAMESPACE,
// DASHSCOPE_API_KEY, LOG_LEVEL.

const replicas = Options.integer("replicas").pipe(
  Options.withDescription("Number of pod replicas"),
  Options.withDefault(2),
);

const tag = Options.text("tag").pipe(
  Options.withDescription("Image tag (defaults to the short git hash)"),
  Options.optional,
);

const dryRun = Options.boolean("dry-run").pipe(
  Options.withDescription("Print the manifests instead of deploying"),
);

const up = Command.make("up", { replicas, tag, dryRun }, ({ replicas, tag, dryRun }) =>
  Effect.gen(function* () {
    const env = yield* DeployEnvironment;
    if (Option.isNone(env.apiKey)) {
      yield* Console.log(
        formatWarning("DASHSCOPE_API_KEY not set; the deployment gets no model credential"),
      );
    }

    const imageTag = Option.isSome(tag) ? tag.value : yield* currentGitTag;
    const config = makeDeploymentConfig({ ...env, imageTag, replicas });

    if (dryRun) {
      const valid = yield* validateDeploymentConfig(config);
      yield* Console.log(
        JSON.stringify(manifestList(valid, { revealSecrets: false }), null, 2),
      );
      return;
    }

    yield* Console.log(formatDeployPlan(config));
    const result = yield* deployService(config);
    yield* Console.log(formatDeployResult(result));
  }),
).pipe(Command.withDescription("Build, push and deploy the service"));

const down = Command.make("down", {}, () =>
  Effect.gen(function* () {
    const env = yield* DeployEnvironment;
    yield* teardownService(env.namespace);
    yield* Console.log(formatWarning(`Deleted namespace ${env.namespace}`));
  }),
).pipe(Command.withDescription("Delete the service's namespace"));

const command = Command.make("stock-agent-deploy").pipe(
  Command.withSubcommands([up, down]),
);

// --- Run ---

const cli = Command.run(command, {
  name: "stock-agent-deploy",
  version: "0.1.0",
});

const logDeployError = (e: DeployError) =>
  Console.error(formatDeployError(e)).pipe(
    Effect.zipRight(Effect.sync(() => {
      process.exitCode = 1;
    })),
  );

cli(process.argv).pipe(
  Effect.catchTags({
    DeploymentConfigError: logDeployError,
    ImageBuildError: logDeployError,
    ImagePushError: logDeployError,
    ClusterApplyError: logDeployError,
  }),
  Effect.provide(DockerKubectlDeployerLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
