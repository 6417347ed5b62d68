// Deployment configuration — the payload handed to a Deployer, plus the
// consistency checks it must pass before anything is built.

import { Config, Data, Effect, Option, type Redacted } from "effect";
import { DEFAULT_PORT, HEALTH_PATH } from "../http/routes.js";

// --- Types ---

export interface ResourceQuantities {
  readonly cpu: string; // e.g. "500m"
  readonly memory: string; // e.g. "1Gi"
}

export interface HttpProbe {
  readonly path: string;
  readonly port: number;
  readonly initialDelaySeconds: number;
  readonly periodSeconds: number;
}

export interface DeploymentConfig {
  readonly imageName: string;
  readonly imageTag: string;
  readonly registryUrl: string;
  readonly registryNamespace: string;
  readonly baseImage: string;
  readonly platform: string;
  readonly pushToRegistry: boolean;
  readonly port: number;
  readonly replicas: number;
  readonly resources: {
    readonly requests: ResourceQuantities;
    readonly limits: ResourceQuantities;
  };
  readonly healthPath: string;
  readonly readinessProbe: HttpProbe;
  readonly livenessProbe: HttpProbe;
  readonly environment: Readonly<Record<string, string>>;
  /** Rendered into a Secret and referenced from the container env. */
  readonly secretEnvironment: Readonly<Record<string, Redacted.Redacted<string>>>;
  readonly imagePullSecrets: readonly string[];
  readonly namespace: string;
}

export class DeploymentConfigError extends Data.TaggedError(
  "DeploymentConfigError",
)<{
  readonly issues: readonly string[];
}> {}

// --- Environment ---

export interface DeployEnvironment {
  readonly registryUrl: string;
  readonly registryNamespace: string;
  readonly namespace: string;
  readonly logLevel: string;
  readonly apiKey: Option.Option<Redacted.Redacted<string>>;
}

export const DeployEnvironment: Config.Config<DeployEnvironment> = Config.all({
  registryUrl: Config.string("DOCKER_REGISTRY").pipe(Config.withDefault("")),
  registryNamespace: Config.string("REGISTRY_NAMESPACE").pipe(
    Config.withDefault("stock-agent"),
  ),
  namespace: Config.string("K8S_NAMESPACE").pipe(
    Config.withDefault("stock-agent"),
  ),
  logLevel: Config.string("LOG_LEVEL").pipe(Config.withDefault("Info")),
  apiKey: Config.option(Config.redacted("DASHSCOPE_API_KEY")),
});

// --- Construction ---

export interface DeploymentParams extends DeployEnvironment {
  readonly imageTag: string;
  readonly replicas?: number;
}

export function makeDeploymentConfig(params: DeploymentParams): DeploymentConfig {
  const port = DEFAULT_PORT;
  return {
    imageName: "stock-agent",
    imageTag: params.imageTag,
    registryUrl: params.registryUrl,
    registryNamespace: params.registryNamespace,
    baseImage: "node:20-slim",
    platform: "linux/amd64",
    pushToRegistry: true,
    port,
    replicas: params.replicas ?? 2,
    resources: {
      requests: { cpu: "500m", memory: "1Gi" },
      limits: { cpu: "2000m", memory: "4Gi" },
    },
    healthPath: HEALTH_PATH,
    readinessProbe: {
      path: HEALTH_PATH,
      port,
      initialDelaySeconds: 10,
      periodSeconds: 5,
    },
    livenessProbe: {
      path: HEALTH_PATH,
      port,
      initialDelaySeconds: 30,
      periodSeconds: 10,
    },
    environment: {
      NODE_ENV: "production",
      PORT: String(port),
      LOG_LEVEL: params.logLevel,
    },
    secretEnvironment: Option.match(params.apiKey, {
      onNone: () => ({}),
      onSome: (key) => ({ DASHSCOPE_API_KEY: key }),
    }),
    imagePullSecrets: ["regcred"],
    namespace: params.namespace,
  };
}

export function imageReference(config: DeploymentConfig): string {
  const repository = [config.registryUrl, config.registryNamespace, config.imageName]
    .filter((segment) => segment.length > 0)
    .join("/");
  return `${repository}:${config.imageTag}`;
}

export function serviceUrl(config: DeploymentConfig): string {
  return `http://${config.imageName}.${config.namespace}.svc.cluster.local:${config.port}`;
}

// --- Resource quantities ---

const CPU_PATTERN = /^(\d+(?:\.\d+)?)(m?)$/;
const MEMORY_PATTERN = /^(\d+(?:\.\d+)?)(Ki|Mi|Gi|Ti|K|M|G|T)?$/;

const MEMORY_UNITS: Record<string, number> = {
  "": 1,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
};

/** CPU quantity in cores ("500m" → 0.5), or undefined if malformed. */
export function parseCpu(quantity: string): number | undefined {
  const match = CPU_PATTERN.exec(quantity);
  if (match === null) return undefined;
  const value = Number(match[1]);
  return match[2] === "m" ? value / 1000 : value;
}

/** Memory quantity in bytes ("1Gi" → 1073741824), or undefined if malformed. */
export function parseMemory(quantity: string): number | undefined {
  const match = MEMORY_PATTERN.exec(quantity);
  if (match === null) return undefined;
  return Number(match[1]) * MEMORY_UNITS[match[2] ?? ""];
}

// --- Validation ---

function quantityIssues(
  kind: "cpu" | "memory",
  parse: (quantity: string) => number | undefined,
  request: string,
  limit: string,
): string[] {
  const requested = parse(request);
  const limited = parse(limit);
  const issues: string[] = [];
  if (requested === undefined) issues.push(`invalid ${kind} request '${request}'`);
  if (limited === undefined) issues.push(`invalid ${kind} limit '${limit}'`);
  if (requested !== undefined && limited !== undefined && requested > limited) {
    issues.push(`${kind} request ${request} exceeds limit ${limit}`);
  }
  return issues;
}

function probeIssues(
  name: string,
  probe: HttpProbe,
  config: DeploymentConfig,
): string[] {
  const issues: string[] = [];
  if (probe.port !== config.port) {
    issues.push(`${name} probe port ${probe.port} does not match container port ${config.port}`);
  }
  if (probe.path !== config.healthPath) {
    issues.push(`${name} probe path '${probe.path}' does not match health path '${config.healthPath}'`);
  }
  return issues;
}

export function deploymentConfigIssues(config: DeploymentConfig): string[] {
  const { requests, limits } = config.resources;
  return [
    ...(config.imageName.length === 0 ? ["image name is empty"] : []),
    ...(config.imageTag.length === 0 ? ["image tag is empty"] : []),
    ...(config.namespace.length === 0 ? ["namespace is empty"] : []),
    ...(!Number.isInteger(config.replicas) || config.replicas < 1
      ? [`replicas must be a positive integer, got ${config.replicas}`]
      : []),
    ...(!Number.isInteger(config.port) || config.port < 1 || config.port > 65535
      ? [`port must be between 1 and 65535, got ${config.port}`]
      : []),
    ...quantityIssues("cpu", parseCpu, requests.cpu, limits.cpu),
    ...quantityIssues("memory", parseMemory, requests.memory, limits.memory),
    ...probeIssues("readiness", config.readinessProbe, config),
    ...probeIssues("liveness", config.livenessProbe, config),
  ];
}

export function validateDeploymentConfig(
  config: DeploymentConfig,
): Effect.Effect<DeploymentConfig, DeploymentConfigError> {
  const issues = deploymentConfigIssues(config);
  return issues.length === 0
    ? Effect.succeed(config)
    : Effect.fail(new DeploymentConfigError({ issues }));
}
