// Kubernetes manifests rendered from a DeploymentConfig. Pure; no I/O.

import { Redacted } from "effect";
import {
  imageReference,
  type DeploymentConfig,
  type HttpProbe,
} from "./deployment-config.js";

export interface Manifest {
  readonly apiVersion: string;
  readonly kind: string;
  readonly metadata: {
    readonly name: string;
    readonly namespace?: string;
    readonly labels?: Readonly<Record<string, string>>;
  };
  readonly [field: string]: unknown;
}

export interface RenderOptions {
  /** Write secret values in clear text. Off for anything printed. */
  readonly revealSecrets: boolean;
}

export function secretName(config: DeploymentConfig): string {
  return `${config.imageName}-credentials`;
}

function renderProbe(probe: HttpProbe) {
  return {
    httpGet: { path: probe.path, port: probe.port },
    initialDelaySeconds: probe.initialDelaySeconds,
    periodSeconds: probe.periodSeconds,
  };
}

function renderEnv(config: DeploymentConfig) {
  const plain = Object.entries(config.environment).map(([name, value]) => ({
    name,
    value,
  }));
  const secret = Object.keys(config.secretEnvironment).map((name) => ({
    name,
    valueFrom: { secretKeyRef: { name: secretName(config), key: name } },
  }));
  return [...plain, ...secret];
}

export function renderManifests(
  config: DeploymentConfig,
  options: RenderOptions,
): Manifest[] {
  const labels = { app: config.imageName };
  const namespace = config.namespace;
  const secrets = Object.entries(config.secretEnvironment);

  const manifests: Manifest[] = [
    { apiVersion: "v1", kind: "Namespace", metadata: { name: namespace } },
  ];

  if (secrets.length > 0) {
    manifests.push({
      apiVersion: "v1",
      kind: "Secret",
      metadata: { name: secretName(config), namespace, labels },
      type: "Opaque",
      stringData: Object.fromEntries(
        secrets.map(([key, value]) => [
          key,
          options.revealSecrets ? Redacted.value(value) : "<redacted>",
        ]),
      ),
    });
  }

  manifests.push(
    {
      apiVersion: "apps/v1",
      kind: "Deployment",
      metadata: { name: config.imageName, namespace, labels },
      spec: {
        replicas: config.replicas,
        selector: { matchLabels: labels },
        template: {
          metadata: { labels },
          spec: {
            imagePullSecrets: config.imagePullSecrets.map((name) => ({ name })),
            containers: [
              {
                name: config.imageName,
                image: imageReference(config),
                ports: [{ containerPort: config.port }],
                env: renderEnv(config),
                resources: config.resources,
                readinessProbe: renderProbe(config.readinessProbe),
                livenessProbe: renderProbe(config.livenessProbe),
              },
            ],
          },
        },
      },
    },
    {
      apiVersion: "v1",
      kind: "Service",
      metadata: { name: config.imageName, namespace, labels },
      spec: {
        type: "ClusterIP",
        selector: labels,
        ports: [{ port: config.port, targetPort: config.port, protocol: "TCP" }],
      },
    },
  );

  return manifests;
}

/** A single `List` document, the form `kubectl apply -f -` reads. */
export function manifestList(config: DeploymentConfig, options: RenderOptions) {
  return {
    apiVersion: "v1",
    kind: "List",
    items: renderManifests(config, options),
  };
}
