/**
 * Diff engine tests
 */

import { describe, it, expect } from "vitest";
import { DiffEngine, diff } from "../src/index.js";
import { at, registry, samplePod } from "./helpers.js";

describe("diff", () => {
  it("should find nothing between a tree and its copy", () => {
    const pod = samplePod();
    expect(diff(pod, pod.dup())).toEqual([]);
    expect(new DiffEngine().diff(pod, pod)).toEqual([]);
  });

  it("should report one deeply nested scalar change at its depth", () => {
    const a = samplePod();
    const b = a.dup();
    at(b, "spec", "containers", 1, "lifecycle", "postStart", "httpGet").set("port", 9001);

    const records = diff(a, b);
    expect(records).toEqual([
      {
        path: ["spec", "containers", 1, "lifecycle", "postStart", "httpGet", "port"],
        kind: "value-mismatch",
        report:
          "Value mismatch at spec.containers[1].lifecycle.postStart.httpGet.port: 9000 vs 9001",
      },
    ]);
    expect(records[0].path).toHaveLength(7);
  });

  it("should report records in depth-first field order", () => {
    const a = samplePod();
    const b = a.dup();
    at(b, "spec", "containers", 1).set("name", "proxy");
    at(b, "spec", "containers", 0).set("image", "registry.example.test/web:1.5");

    expect(diff(a, b).map((r) => r.path)).toEqual([
      ["spec", "containers", 0, "image"],
      ["spec", "containers", 1, "name"],
    ]);
  });

  describe("Scalars", () => {
    it("should tell type mismatches from value mismatches", () => {
      const a = registry.create("v1/ObjectMeta", { generation: 3 });
      const b = registry.create("v1/ObjectMeta", { generation: "3" });

      expect(diff(a, b)).toEqual([
        {
          path: ["generation"],
          kind: "type-mismatch",
          report: "Type mismatch at generation: number vs string",
        },
      ]);
    });

    it("should report absent against present as a value mismatch", () => {
      const a = samplePod();
      const b = a.dup();
      at(b, "spec").set("hostname", "web-0");

      const [record] = diff(a, b);
      expect(record.kind).toBe("value-mismatch");
      expect(record.report).toBe('Value mismatch at spec.hostname: null vs "web-0"');
    });
  });

  describe("Lists", () => {
    it("should report one length mismatch and not descend", () => {
      const a = samplePod();
      const b = a.dup();
      at(b, "spec").append("containers", registry.create("v1/Container", { name: "extra" }));

      expect(diff(a, b)).toEqual([
        {
          path: ["spec", "containers"],
          kind: "length-mismatch",
          report: "Length mismatch at spec.containers: 2 vs 3",
        },
      ]);
    });

    it("should report elements of different kinds", () => {
      const a = samplePod();
      const b = a.dup();
      at(b, "spec", "containers", 1).set("args", ["--port", 9000]);

      expect(diff(a, b)).toEqual([
        {
          path: ["spec", "containers", 1, "args", 1],
          kind: "element-mismatch",
          report: "Element mismatch at spec.containers[1].args[1]: string vs integer",
        },
      ]);
    });

    it("should report elements with different descriptors", () => {
      const a = registry.create("v1/PodSpec", {
        containers: [registry.create("v1/Container", { name: "app" })],
      });
      const b = registry.create("v1/PodSpec", {
        containers: [registry.create("v1/EnvVar", { name: "app" })],
      });

      expect(diff(a, b).map((r) => r.report)).toEqual([
        "Element mismatch at containers[0]: v1/Container vs v1/EnvVar",
      ]);
    });

    it("should report differing scalar elements as value mismatches", () => {
      const a = samplePod();
      const b = a.dup();
      at(b, "spec", "containers", 1).list("args")[1] = "9001";

      expect(diff(a, b).map((r) => r.report)).toEqual([
        'Value mismatch at spec.containers[1].args[1]: "9000" vs "9001"',
      ]);
    });
  });

  describe("Maps", () => {
    it("should report one key mismatch naming the keys not in both", () => {
      const a = samplePod();
      const b = a.dup();
      const labels = at(b, "metadata").map("labels");
      labels.zone = "east";
      delete labels.app;

      expect(diff(a, b)).toEqual([
        {
          path: ["metadata", "labels"],
          kind: "key-mismatch",
          report: "Key mismatch at metadata.labels: keys not in both: app, zone",
        },
      ]);
    });

    it("should report one item mismatch per differing key", () => {
      const a = samplePod();
      const b = a.dup();
      const labels = at(b, "metadata").map("labels");
      labels.app = "api";
      labels.tier = "backend";

      expect(diff(a, b)).toEqual([
        {
          path: ["metadata", "labels", "app"],
          kind: "item-mismatch",
          report: 'Item mismatch at metadata.labels.app: "web" vs "api"',
        },
        {
          path: ["metadata", "labels", "tier"],
          kind: "item-mismatch",
          report: 'Item mismatch at metadata.labels.tier: "frontend" vs "backend"',
        },
      ]);
    });

    it("should treat inherited property names as missing keys", () => {
      const a = registry.create("v1/ObjectMeta", { labels: { constructor: "x" } });
      const b = registry.create("v1/ObjectMeta", { labels: { toString: "y" } });

      expect(diff(a, b)).toEqual([
        {
          path: ["labels"],
          kind: "key-mismatch",
          report: "Key mismatch at labels: keys not in both: constructor, toString",
        },
      ]);
    });
  });

  describe("Incompatible types", () => {
    it("should stop at different root descriptors", () => {
      expect(diff(samplePod(), registry.create("v1/ConfigMap"))).toEqual([
        {
          path: [],
          kind: "incompatible-types",
          report: "Incompatible types at <root>: v1/Pod vs v1/ConfigMap",
        },
      ]);
    });

    it("should stop at values of different categories", () => {
      const a = registry.create("v1/ObjectMeta", { labels: ["app"] });
      const b = registry.create("v1/ObjectMeta", { labels: { app: "web" } });

      expect(diff(a, b).map((r) => r.report)).toEqual([
        "Incompatible types at labels: list vs dict",
      ]);
    });
  });
});
