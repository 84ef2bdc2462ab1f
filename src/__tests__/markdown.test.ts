import { describe, expect, it } from "vitest";
import { buildTree } from "../importer";
import { formatHeader, parseDocument, parseHeader, renderDocument } from "../markdown";
import { DEFAULT_FILTER_CONFIG } from "../settings";
import type { InstanceNode, PathRecord } from "../types";
import { walkTree } from "../walker";

const workspace: PathRecord = { path: "Workspace", id: "W0", className: "Workspace", properties: [] };
const baseplate: PathRecord = {
  path: "Workspace.Baseplate",
  id: "U1",
  className: "Part",
  properties: ["- Anchored: true"]
};

describe("formatHeader", () => {
  it("appends the class only when asked", () => {
    expect(formatHeader(baseplate, false)).toBe("Workspace.Baseplate (U1)");
    expect(formatHeader(baseplate, true)).toBe("Workspace.Baseplate (U1) [Part]");
  });
});

describe("renderDocument", () => {
  it("sorts records by path and separates them with blank lines", () => {
    expect(renderDocument([baseplate, workspace], { showClass: false, showProperties: true })).toBe(
      "Workspace (W0)\n\nWorkspace.Baseplate (U1)\n- Anchored: true\n"
    );
  });

  it("can leave properties out", () => {
    expect(renderDocument([baseplate], { showClass: true, showProperties: false })).toBe(
      "Workspace.Baseplate (U1) [Part]\n"
    );
  });

  it("renders nothing for no records", () => {
    expect(renderDocument([], { showClass: false, showProperties: true })).toBe("");
  });
});

describe("parseHeader", () => {
  it("reads the path, id and optional class", () => {
    expect(parseHeader("Workspace.Baseplate (U1) [Part]")).toEqual({
      path: "Workspace.Baseplate",
      id: "U1",
      className: "Part"
    });
    expect(parseHeader("Workspace (W0)")).toEqual({ path: "Workspace", id: "W0", className: undefined });
  });

  it("allows parentheses inside the path", () => {
    expect(parseHeader('Workspace["Door (Left)"] (D1)')).toEqual({
      path: 'Workspace["Door (Left)"]',
      id: "D1",
      className: undefined
    });
  });

  it("rejects lines without an id", () => {
    expect(parseHeader("Workspace")).toBeUndefined();
  });
});

describe("parseDocument", () => {
  it("reads records and defaults the class to Part", () => {
    const text = "Workspace (W0) [Workspace]\n\nWorkspace.Baseplate (U1)\n- Anchored: true\n- Position: (1, 2, 3)\n";
    expect(parseDocument(text)).toEqual([
      { path: "Workspace", id: "W0", className: "Workspace", properties: [] },
      {
        path: "Workspace.Baseplate",
        id: "U1",
        className: "Part",
        properties: ["- Anchored: true", "- Position: (1, 2, 3)"]
      }
    ]);
  });

  it("keeps indented lines with the property above them", () => {
    const text = [
      "Workspace.Baseplate (U1) [Part]",
      "- Cell [UNSUPPORTED TYPE: Vector3int16]",
      "  - X: 1",
      "  - Y: 2",
      "- Anchored: true",
      ""
    ].join("\r\n");
    expect(parseDocument(text)[0].properties).toEqual([
      "- Cell [UNSUPPORTED TYPE: Vector3int16]\n  - X: 1\n  - Y: 2",
      "- Anchored: true"
    ]);
  });

  it("ignores property lines outside a record", () => {
    expect(parseDocument("- Anchored: true\n\nLighting (L0)\n")).toEqual([
      { path: "Lighting", id: "L0", className: "Part", properties: [] }
    ]);
  });

  it("reads back what renderDocument writes", () => {
    const records = [workspace, baseplate];
    const text = renderDocument(records, { showClass: true, showProperties: true });
    expect(parseDocument(text)).toEqual(records);
  });
});

describe("multi-line values", () => {
  it("stay inside their record through render and parse", () => {
    const label: InstanceNode = {
      className: "TextLabel",
      name: "Label",
      id: "L1",
      properties: {
        Text: { type: "string", value: "Hello\n\nGhost.Node (G9)" },
        Visible: { type: "bool", value: true }
      },
      children: []
    };
    const { records } = walkTree([label], DEFAULT_FILTER_CONFIG);
    const text = renderDocument(records, { showClass: true, showProperties: true });
    expect(text).toBe("Label (L1) [TextLabel]\n- Text: Hello\\n\\nGhost.Node (G9)\n- Visible: true\n");

    const parsed = parseDocument(text);
    expect(parsed).toHaveLength(1);
    expect(buildTree(parsed)).toEqual([label]);
  });
});
