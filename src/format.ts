// Pure formatting functions for the CLIs — no I/O.

import type { LookupResult } from "./domain.js";
import {
  imageReference,
  type DeploymentConfig,
} from "./deploy/deployment-config.js";
import type { DeployError, DeployResult } from "./deploy/deployer.js";
import type { LoadTestReport } from "./smoke/smoke-client.js";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Smoke test output ---

export function formatStep(index: number, title: string): string {
  return `\n${BOLD}${index}. ${title}${RESET}`;
}

export function formatPass(message: string): string {
  return `  ${GREEN}✓${RESET} ${message}`;
}

export function formatFail(message: string): string {
  return `  ${RED}✗${RESET} ${message}`;
}

export function formatWarning(message: string): string {
  return `  ${YELLOW}!${RESET} ${message}`;
}

export function formatLookup(result: LookupResult): string {
  switch (result._tag) {
    case "Found":
      return formatPass(
        `${result.record.symbol}: $${result.record.price} (${result.record.change})`,
      );
    case "NotFound":
      return formatWarning(`${result.symbol}: ${result.message}`);
  }
}

export function formatLoadReport(report: LoadTestReport): string {
  return `  Success rate: ${report.percentage.toFixed(1)}% (${report.successes}/${report.total})`;
}

// --- Deploy output ---

export function formatDeployPlan(config: DeploymentConfig): string {
  const { requests, limits } = config.resources;
  return [
    "",
    `${BOLD}  Deploying ${config.imageName}${RESET}`,
    `  Image:     ${imageReference(config)}`,
    `  Replicas:  ${config.replicas}`,
    `  Resources: ${requests.cpu}/${requests.memory} requested, ${limits.cpu}/${limits.memory} limit`,
    `  Namespace: ${config.namespace}`,
    "",
  ].join("\n");
}

export function formatDeployResult(result: DeployResult): string {
  const n = result.namespace;
  return [
    "",
    `${GREEN}${BOLD}  ✓ Deployment successful${RESET}`,
    `  Service URL: ${result.url}`,
    `  Deployment:  ${result.deploymentName}`,
    `  Namespace:   ${n}`,
    "",
    `${DIM}  kubectl get pods -n ${n}`,
    `  kubectl logs -n ${n} -l app=${result.deploymentName}`,
    `  kubectl scale deployment ${result.deploymentName} --replicas=5 -n ${n}${RESET}`,
    "",
  ].join("\n");
}

// --- Error formatting ---

export function formatDeployError(error: DeployError): string {
  const friendly = classifyDeployError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    ...friendly.hints.map((hint) => `  ${DIM}${hint}${RESET}`),
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hints: readonly string[];
}

export function classifyDeployError(error: DeployError): ClassifiedError {
  switch (error._tag) {
    case "DeploymentConfigError":
      return {
        title: "Invalid deployment configuration",
        hints: error.issues,
      };
    case "ImageBuildError":
      return {
        title: `Image build failed: ${error.message}`,
        hints: [
          "Check Docker is running: docker --version",
          `Image: ${error.image}`,
        ],
      };
    case "ImagePushError":
      return {
        title: `Image push failed: ${error.message}`,
        hints: [
          "Check registry access: docker login <registry>",
          "Set DOCKER_REGISTRY to the registry the cluster pulls from.",
        ],
      };
    case "ClusterApplyError":
      return {
        title: `Cluster update failed: ${error.message}`,
        hints: [
          "Verify cluster access: kubectl cluster-info",
          `Check the namespace: kubectl get all -n ${error.namespace}`,
        ],
      };
  }
}
