/**
 * Catalog indexer tests
 */

import { describe, it, expect } from "vitest";
import {
  InvalidArgumentError,
  Logger,
  buildCatalog,
  catalogFor,
  findByName,
  parseFollowing,
  repopulateCatalog,
} from "../src/index.js";
import { at, recordingSink, registry, samplePod } from "./helpers.js";

const paths = (entries: Array<{ path: Array<string | number> }>) =>
  entries.map((entry) => entry.path);

describe("Catalog", () => {
  describe("buildCatalog", () => {
    it("should walk the tree in pre-order, skipping empty containers", () => {
      const entries = buildCatalog(samplePod());

      expect(paths(entries.slice(0, 8))).toEqual([
        ["apiVersion"],
        ["kind"],
        ["metadata"],
        ["metadata", "name"],
        ["metadata", "namespace"],
        ["metadata", "labels"],
        ["spec"],
        ["spec", "containers", 0],
      ]);
    });

    it("should add one entry per list element", () => {
      const entries = buildCatalog(samplePod()).filter(
        (entry) => entry.name === "args"
      );

      expect(paths(entries)).toEqual([
        ["spec", "containers", 1, "args", 0],
        ["spec", "containers", 1, "args", 1],
      ]);
      expect(entries[0].ownerPath).toEqual(["spec", "containers", 1]);
      expect(entries[0].owner.key).toBe("v1/Container");
    });
  });

  describe("findByName", () => {
    it("should find every occupied field with the name", () => {
      expect(paths(findByName(samplePod(), "name"))).toEqual([
        ["metadata", "name"],
        ["spec", "containers", 0, "name"],
        ["spec", "containers", 0, "env", 0, "name"],
        ["spec", "containers", 0, "ports", 0, "name"],
        ["spec", "containers", 1, "name"],
        ["spec", "containers", 1, "lifecycle", "postStart", "httpGet", "httpHeaders", 0, "name"],
      ]);
    });

    it("should return nothing for unknown names", () => {
      expect(findByName(samplePod(), "hostname")).toEqual([]);
    });

    it("should restrict matches to owners following the given segments", () => {
      const pod = samplePod();

      expect(findByName(pod, "name", "containers")).toHaveLength(5);
      expect(paths(findByName(pod, "name", "lifecycle.httpGet"))).toEqual([
        ["spec", "containers", 1, "lifecycle", "postStart", "httpGet", "httpHeaders", 0, "name"],
      ]);
    });

    it("should treat list and dotted forms alike", () => {
      const pod = samplePod();
      const dotted = findByName(pod, "name", "containers.1");
      const listed = findByName(pod, "name", ["containers", 1]);

      expect(listed).toEqual(dotted);
      expect(paths(dotted)).toEqual([
        ["spec", "containers", 1, "name"],
        ["spec", "containers", 1, "lifecycle", "postStart", "httpGet", "httpHeaders", 0, "name"],
      ]);
    });

    it("should match any container index when none is given", () => {
      const entries = findByName(samplePod(), "command", "containers.lifecycle");

      expect(entries).toHaveLength(6);
      expect(entries[0].path).toEqual([
        "spec", "containers", 1, "lifecycle", "postStart", "exec", "command", 0,
      ]);
      expect(entries[5].path).toEqual([
        "spec", "containers", 1, "lifecycle", "preStop", "exec", "command", 2,
      ]);
    });

    it("should respect the order of the segments", () => {
      const pod = samplePod();
      expect(findByName(pod, "command", "lifecycle.containers")).toEqual([]);
      expect(findByName(pod, "command", ["containers", 0])).toEqual([]);
    });

    it("should reject a non-string name", () => {
      expect(() => catalogFor(samplePod()).find(42)).toThrow(InvalidArgumentError);
    });

    it("should reject malformed following arguments", () => {
      const catalog = catalogFor(samplePod());

      expect(() => catalog.find("name", {})).toThrow(InvalidArgumentError);
      expect(() => catalog.find("name", "containers..lifecycle")).toThrow(
        'following "containers..lifecycle" has an empty segment'
      );
      expect(() => catalog.find("name", ["containers", -1])).toThrow(
        "following[1] must be a field name or a non-negative integer index"
      );
      expect(() => catalog.find("name", [1.5])).toThrow(InvalidArgumentError);
    });
  });

  describe("parseFollowing", () => {
    it("should turn numeric dotted segments into indices", () => {
      expect(parseFollowing("spec.containers.0.lifecycle")).toEqual([
        "spec",
        "containers",
        0,
        "lifecycle",
      ]);
      expect(parseFollowing("")).toEqual([]);
    });
  });

  describe("Caching", () => {
    it("should keep one catalog per root", () => {
      const pod = samplePod();
      expect(catalogFor(pod)).toBe(catalogFor(pod));
    });

    it("should stay stale until repopulated", () => {
      const pod = samplePod();
      expect(findByName(pod, "hostname")).toEqual([]);

      at(pod, "spec").set("hostname", "web-0");
      expect(findByName(pod, "hostname")).toEqual([]);

      repopulateCatalog(pod);
      expect(paths(findByName(pod, "hostname"))).toEqual([["spec", "hostname"]]);
    });

    it("should log rebuilds at debug", () => {
      const { entries, sink } = recordingSink();
      repopulateCatalog(
        registry.create("v1/EnvVar", { name: "MODE" }),
        new Logger("catalog", "debug", sink)
      );

      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe("Rebuilt catalog for v1/EnvVar");
      expect(entries[0].details).toEqual({ entries: 1 });
    });
  });
});
