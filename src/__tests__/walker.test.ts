import { describe, expect, it } from "vitest";
import { DEFAULT_FILTER_CONFIG } from "../settings";
import type { FilterConfig, InstanceNode, PropertyValue } from "../types";
import { groupRecords, walkTree } from "../walker";

function node(
  className: string,
  name: string | undefined,
  id: string | undefined,
  children: InstanceNode[] = [],
  properties: Record<string, PropertyValue> = {}
): InstanceNode {
  return { className, name, id, properties, children };
}

function makeConfig(overrides: Partial<FilterConfig> = {}): FilterConfig {
  return { ...DEFAULT_FILTER_CONFIG, ...overrides };
}

function paths(roots: InstanceNode[], config: FilterConfig = makeConfig()): string[] {
  return walkTree(roots, config).records.map((record) => record.path);
}

describe("walkTree", () => {
  it("emits a record per node in pre-order", () => {
    const baseplate = node("Part", "Baseplate", "U1", [], { Anchored: { type: "bool", value: true } });
    const { records } = walkTree([node("Workspace", "Workspace", "W0", [baseplate])], makeConfig());
    expect(records).toEqual([
      { path: "Workspace", id: "W0", className: "Workspace", properties: [] },
      { path: "Workspace.Baseplate", id: "U1", className: "Part", properties: ["- Anchored: true"] }
    ]);
  });

  it("brackets names with spaces", () => {
    const spawn = node("SpawnLocation", "Spawn Point", "SP", [node("Part", "Flag", "F1")]);
    expect(paths([node("Workspace", "Workspace", "W0", [spawn])])).toEqual([
      "Workspace",
      'Workspace["Spawn Point"]',
      'Workspace["Spawn Point"].Flag'
    ]);
  });

  it("lets descendants of a class-filtered node inherit its parent's path", () => {
    const script = node("Script", "Handler", "S1", [node("Configuration", "Config", "C1")]);
    const tree = [node("Workspace", "Workspace", "W0", [node("Part", "Baseplate", "U1", [script])])];
    const config = makeConfig({ classBlacklist: ["Script"], useClassBlacklist: true });
    expect(paths(tree, config)).toEqual(["Workspace", "Workspace.Baseplate", "Workspace.Baseplate.Config"]);
  });

  it("emits a shared id only once", () => {
    const tree = [
      node("Workspace", "Workspace", "W0", [
        node("Part", "A", "D1"),
        node("Part", "B", "D1", [node("Part", "Child", "D2")])
      ])
    ];
    const { records } = walkTree(tree, makeConfig());
    expect(records.filter((record) => record.id === "D1")).toHaveLength(1);
    expect(records.map((record) => record.path)).toEqual(["Workspace", "Workspace.A"]);
  });

  it("defaults missing names and ids", () => {
    const { records } = walkTree([node("Folder", undefined, undefined)], makeConfig());
    expect(records).toEqual([{ path: "Unnamed", id: "NoId", className: "Folder", properties: [] }]);
  });

  it("treats every id-less node after the first as already emitted", () => {
    const tree = [node("Workspace", "Workspace", "W0", [node("Part", "A", undefined), node("Part", "B", undefined)])];
    expect(paths(tree)).toEqual(["Workspace", "Workspace.A"]);
  });

  it("skips id-less records but keeps walking their children when asked to", () => {
    const loose = node("Model", "Loose", undefined, [node("Part", "Inner", "I1")]);
    const tree = [node("Workspace", "Workspace", "W0", [loose])];
    expect(paths(tree, makeConfig({ excludeNoIdItems: true }))).toEqual(["Workspace", "Workspace.Loose.Inner"]);
  });

  it("walks below nodes the path whitelist rejects", () => {
    const tree = [node("Workspace", "Workspace", "W0", [node("Model", "Map", "M1", [node("Part", "Spawn", "P1")])])];
    const config = makeConfig({ pathWhitelist: ["game.Workspace.Map.Spawn"], usePathWhitelist: true });
    expect(paths(tree, config)).toEqual(["Workspace.Map.Spawn"]);
  });

  it("encodes properties in name order and skips empty tag blobs", () => {
    const part = node("Part", "Baseplate", "U1", [], {
      Size: { type: "Vector3", x: "4", y: "1", z: "2" },
      Tags: { type: "BinaryString", value: "" },
      AttributesSerialize: { type: "BinaryString", value: "AAAA" },
      Anchored: { type: "bool", value: true }
    });
    const { records } = walkTree([part], makeConfig());
    expect(records[0].properties).toEqual([
      "- Anchored: true",
      "- AttributesSerialize: [Binary Data]",
      "- Size: (4, 1, 2)"
    ]);
  });

  it("reports unsupported property types", () => {
    const part = node("Part", "Baseplate", "U1", [], {
      Odd: { type: "Unsupported", tag: "Vector3int16", entries: [{ kind: "component", tag: "X", text: "1" }] }
    });
    const result = walkTree([node("Workspace", "Workspace", "W0", [part])], makeConfig());
    expect(result.diagnostics).toEqual([{ path: "Workspace.Baseplate", property: "Odd", tag: "Vector3int16" }]);
    expect(result.records[1].properties).toEqual(["- Odd [UNSUPPORTED TYPE: Vector3int16]\n  - X: 1"]);
  });
});

describe("groupRecords", () => {
  it("groups by the first path segment", () => {
    const { records } = walkTree(
      [
        node("Workspace", "Workspace", "W0", [node("Part", "A", "A1")]),
        node("Lighting", "Lighting", "L0"),
        node("Folder", "Spawn Area", "S0", [node("Part", "Pad", "P0")])
      ],
      makeConfig()
    );
    const grouped = groupRecords(records);
    expect([...grouped.keys()]).toEqual(["Workspace", "Lighting", "Spawn Area"]);
    expect(grouped.get("Spawn Area")?.map((record) => record.path)).toEqual(['["Spawn Area"]', '["Spawn Area"].Pad']);
  });
});
