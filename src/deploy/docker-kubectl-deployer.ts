// Docker + kubectl — implementation of Deployer.
//
// Builds the image from the Dockerfile at the repository root, pushes it,
// then applies the rendered manifests. The first failing step aborts the
// run; nothing is retried or rolled back.

import { Command, CommandExecutor } from "@effect/platform";
import { Effect, Layer } from "effect";
import {
  imageReference,
  serviceUrl,
  type DeploymentConfig,
} from "./deployment-config.js";
import {
  ClusterApplyError,
  Deployer,
  ImageBuildError,
  ImagePushError,
} from "./deployer.js";
import { manifestList } from "./manifests.js";

// --- Helpers ---

/** Run `command` with inherited stdio; a non-zero exit becomes `onFailure`. */
function runStep<E>(
  command: Command.Command,
  onFailure: (message: string) => E,
): Effect.Effect<void, E, CommandExecutor.CommandExecutor> {
  return command.pipe(
    Command.stdout("inherit"),
    Command.stderr("inherit"),
    Command.exitCode,
    Effect.mapError((e) => onFailure(e.message)),
    Effect.flatMap((code) =>
      code === 0
        ? Effect.void
        : Effect.fail(onFailure(`exited with code ${code}`)),
    ),
  );
}

/** Short hash of HEAD, or "latest" outside a git checkout. */
export const currentGitTag: Effect.Effect<
  string,
  never,
  CommandExecutor.CommandExecutor
> = Command.make("git", "rev-parse", "--short", "HEAD").pipe(
  Command.string,
  Effect.map((out) => out.trim()),
  Effect.map((tag) => (tag.length > 0 ? tag : "latest")),
  Effect.orElseSucceed(() => "latest"),
);

// --- Steps ---

const buildImage = (config: DeploymentConfig) => {
  const image = imageReference(config);
  return Effect.logInfo(`building ${image}`).pipe(
    Effect.zipRight(
      runStep(
        Command.make(
          "docker",
          "build",
          "--platform",
          config.platform,
          "--build-arg",
          `BASE_IMAGE=${config.baseImage}`,
          "-t",
          image,
          ".",
        ),
        (message) => new ImageBuildError({ image, message }),
      ),
    ),
  );
};

const pushImage = (config: DeploymentConfig) => {
  const image = imageReference(config);
  if (!config.pushToRegistry) {
    return Effect.logInfo(`push disabled, keeping ${image} local`);
  }
  return Effect.logInfo(`pushing ${image}`).pipe(
    Effect.zipRight(
      runStep(
        Command.make("docker", "push", image),
        (message) => new ImagePushError({ image, message }),
      ),
    ),
  );
};

const applyManifests = (config: DeploymentConfig) =>
  Effect.logInfo(`applying manifests to namespace ${config.namespace}`).pipe(
    Effect.zipRight(
      runStep(
        Command.make("kubectl", "apply", "-f", "-").pipe(
          Command.feed(
            JSON.stringify(manifestList(config, { revealSecrets: true })),
          ),
        ),
        (message) =>
          new ClusterApplyError({ namespace: config.namespace, message }),
      ),
    ),
  );

// --- Layer ---

export const DockerKubectlDeployerLive = Layer.effect(
  Deployer,
  Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor;
    const provideExecutor = Effect.provideService(
      CommandExecutor.CommandExecutor,
      executor,
    );

    return Deployer.of({
      deploy: (config) =>
        Effect.gen(function* () {
          yield* buildImage(config);
          yield* pushImage(config);
          yield* applyManifests(config);
          return {
            url: serviceUrl(config),
            deploymentName: config.imageName,
            namespace: config.namespace,
            image: imageReference(config),
          };
        }).pipe(provideExecutor),

      teardown: (namespace) =>
        runStep(
          Command.make("kubectl", "delete", "namespace", namespace, "--ignore-not-found"),
          (message) => new ClusterApplyError({ namespace, message }),
        ).pipe(provideExecutor),
    });
  }),
);
