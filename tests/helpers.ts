import { fileURLToPath } from "url";
import { DescriptorRegistry } from "../src/index.js";
import type { FieldInit, LogEntry, LogSink, TreeNode } from "../src/index.js";

export function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export const registry = DescriptorRegistry.load(fixture("k8s-descriptors.json"));

export function recordingSink(): { entries: LogEntry[]; sink: LogSink } {
  const entries: LogEntry[] = [];
  return { entries, sink: (entry) => entries.push(entry) };
}

/** Same tree as the first document of fixtures/pod.yaml. */
export function samplePod(): TreeNode {
  const node = (key: string, init: FieldInit = {}) => registry.create(key, init);

  const app = node("v1/Container", {
    name: "app",
    image: "registry.example.test/web:1.4",
    ports: [node("v1/ContainerPort", { containerPort: 8080, name: "http" })],
    env: [node("v1/EnvVar", { name: "MODE", value: "production" })],
    resources: node("v1/ResourceRequirements", {
      limits: { cpu: "500m", memory: "256Mi" },
      requests: { cpu: "250m" },
    }),
  });

  const sidecar = node("v1/Container", {
    name: "sidecar",
    image: "registry.example.test/proxy:2.0",
    args: ["--port", "9000"],
    lifecycle: node("v1/Lifecycle", {
      postStart: node("v1/Handler", {
        exec: node("v1/ExecAction", {
          command: ["/bin/sh", "-c", "echo started"],
        }),
        httpGet: node("v1/HTTPGetAction", {
          port: 9000,
          path: "/ready",
          httpHeaders: [node("v1/HTTPHeader", { name: "X-Probe", value: "start" })],
        }),
        tcpSocket: node("v1/TCPSocketAction", { port: 9000 }),
      }),
      preStop: node("v1/Handler", {
        exec: node("v1/ExecAction", { command: ["/bin/sh", "-c", "sleep 5"] }),
      }),
    }),
  });

  return node("v1/Pod", {
    metadata: node("v1/ObjectMeta", {
      name: "web",
      namespace: "shop",
      labels: { app: "web", tier: "frontend" },
    }),
    spec: node("v1/PodSpec", {
      restartPolicy: "Always",
      containers: [app, sidecar],
    }),
  });
}

/** Walk a chain of single-node fields. */
export function at(root: TreeNode, ...names: Array<string | number>): TreeNode {
  let current = root;
  for (let i = 0; i < names.length; i++) {
    const name = names[i];
    const next = names[i + 1];
    if (typeof name !== "string") {
      throw new Error(`expected a field name at step ${i}`);
    }
    if (typeof next === "number") {
      current = current.children(name)[next];
      i++;
    } else {
      current = current.child(name);
    }
  }
  return current;
}
