import { Effect, Either, Option, Redacted } from "effect";
import { expect, test } from "vitest";
import {
  deploymentConfigIssues,
  imageReference,
  makeDeploymentConfig,
  parseCpu,
  parseMemory,
  serviceUrl,
  validateDeploymentConfig,
  type DeploymentConfig,
  type DeploymentParams,
} from "./deployment-config.js";

// --- Test data ---

const params: DeploymentParams = {
  registryUrl: "registry.example.com",
  registryNamespace: "stock-agent",
  namespace: "stock-demo",
  logLevel: "Info",
  apiKey: Option.none(),
  imageTag: "abc123",
};

const config = makeDeploymentConfig(params);

// --- makeDeploymentConfig ---

test("makeDeploymentConfig: defaults match the service", () => {
  expect(config.replicas).toBe(2);
  expect(config.port).toBe(8080);
  expect(config.resources).toEqual({
    requests: { cpu: "500m", memory: "1Gi" },
    limits: { cpu: "2000m", memory: "4Gi" },
  });
  expect(config.readinessProbe).toEqual({
    path: "/health",
    port: 8080,
    initialDelaySeconds: 10,
    periodSeconds: 5,
  });
  expect(config.livenessProbe).toEqual({
    path: "/health",
    port: 8080,
    initialDelaySeconds: 30,
    periodSeconds: 10,
  });
  expect(config.imagePullSecrets).toEqual(["regcred"]);
  expect(config.environment).toEqual({
    NODE_ENV: "production",
    PORT: "8080",
    LOG_LEVEL: "Info",
  });
});

test("makeDeploymentConfig: no API key means no secret environment", () => {
  expect(config.secretEnvironment).toEqual({});
});

test("makeDeploymentConfig: API key goes to the secret environment", () => {
  const withKey = makeDeploymentConfig({
    ...params,
    apiKey: Option.some(Redacted.make("test-secret")),
  });
  expect(Object.keys(withKey.secretEnvironment)).toEqual(["DASHSCOPE_API_KEY"]);
  expect(Redacted.value(withKey.secretEnvironment.DASHSCOPE_API_KEY)).toBe(
    "test-secret",
  );
});

test("makeDeploymentConfig: replicas override", () => {
  expect(makeDeploymentConfig({ ...params, replicas: 5 }).replicas).toBe(5);
});

// --- References ---

test("imageReference: registry, namespace, name and tag", () => {
  expect(imageReference(config)).toBe(
    "registry.example.com/stock-agent/stock-agent:abc123",
  );
});

test("imageReference: empty registry is left out", () => {
  expect(imageReference({ ...config, registryUrl: "" })).toBe(
    "stock-agent/stock-agent:abc123",
  );
});

test("serviceUrl: cluster-internal DNS name", () => {
  expect(serviceUrl(config)).toBe(
    "http://stock-agent.stock-demo.svc.cluster.local:8080",
  );
});

// --- Quantities ---

test("parseCpu: millicores and cores", () => {
  expect(parseCpu("500m")).toBe(0.5);
  expect(parseCpu("2000m")).toBe(2);
  expect(parseCpu("1.5")).toBe(1.5);
  expect(parseCpu("two")).toBeUndefined();
});

test("parseMemory: binary and decimal suffixes", () => {
  expect(parseMemory("1Gi")).toBe(1073741824);
  expect(parseMemory("512Mi")).toBe(536870912);
  expect(parseMemory("1G")).toBe(1000000000);
  expect(parseMemory("128")).toBe(128);
  expect(parseMemory("4x")).toBeUndefined();
});

// --- Validation ---

test("deploymentConfigIssues: default config is consistent", () => {
  expect(deploymentConfigIssues(config)).toEqual([]);
});

test("deploymentConfigIssues: requests above limits", () => {
  const bad: DeploymentConfig = {
    ...config,
    resources: {
      requests: { cpu: "4000m", memory: "8Gi" },
      limits: { cpu: "2000m", memory: "4Gi" },
    },
  };
  expect(deploymentConfigIssues(bad)).toEqual([
    "cpu request 4000m exceeds limit 2000m",
    "memory request 8Gi exceeds limit 4Gi",
  ]);
});

test("deploymentConfigIssues: malformed quantities", () => {
  const bad: DeploymentConfig = {
    ...config,
    resources: {
      requests: { cpu: "lots", memory: "1Gi" },
      limits: { cpu: "2000m", memory: "4Gi" },
    },
  };
  expect(deploymentConfigIssues(bad)).toEqual(["invalid cpu request 'lots'"]);
});

test("deploymentConfigIssues: probes must target the container's health path", () => {
  const bad: DeploymentConfig = {
    ...config,
    readinessProbe: { ...config.readinessProbe, port: 9090 },
    livenessProbe: { ...config.livenessProbe, path: "/ready" },
  };
  expect(deploymentConfigIssues(bad)).toEqual([
    "readiness probe port 9090 does not match container port 8080",
    "liveness probe path '/ready' does not match health path '/health'",
  ]);
});

test("deploymentConfigIssues: replicas and tag", () => {
  expect(deploymentConfigIssues({ ...config, replicas: 0, imageTag: "" })).toEqual([
    "image tag is empty",
    "replicas must be a positive integer, got 0",
  ]);
});

test("validateDeploymentConfig: fails with every issue", async () => {
  const result = await Effect.runPromise(
    Effect.either(validateDeploymentConfig({ ...config, replicas: 1.5 })),
  );
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left._tag).toBe("DeploymentConfigError");
  expect(result.left.issues).toEqual([
    "replicas must be a positive integer, got 1.5",
  ]);
});

test("validateDeploymentConfig: passes a consistent config through", async () => {
  const valid = await Effect.runPromise(validateDeploymentConfig(config));
  expect(valid).toBe(config);
});
