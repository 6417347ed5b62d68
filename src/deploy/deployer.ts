// Deployer — service definition and deployment errors.

import { Context, Data, Effect } from "effect";
import type {
  DeploymentConfig,
  DeploymentConfigError,
} from "./deployment-config.js";

// --- Errors ---

export class ImageBuildError extends Data.TaggedError("ImageBuildError")<{
  readonly image: string;
  readonly message: string;
}> {}

export class ImagePushError extends Data.TaggedError("ImagePushError")<{
  readonly image: string;
  readonly message: string;
}> {}

export class ClusterApplyError extends Data.TaggedError("ClusterApplyError")<{
  readonly namespace: string;
  readonly message: string;
}> {}

export type DeployError =
  | DeploymentConfigError
  | ImageBuildError
  | ImagePushError
  | ClusterApplyError;

// --- Service ---

export interface DeployResult {
  readonly url: string;
  readonly deploymentName: string;
  readonly namespace: string;
  readonly image: string;
}

export class Deployer extends Context.Tag("Deployer")<
  Deployer,
  {
    readonly deploy: (
      config: DeploymentConfig,
    ) => Effect.Effect<DeployResult, ImageBuildError | ImagePushError | ClusterApplyError>;
    readonly teardown: (namespace: string) => Effect.Effect<void, ClusterApplyError>;
  }
>() {}
