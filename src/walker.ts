import { includeClass, includePath } from "./filter";
import { encodeSegment, joinPath, splitPath } from "./path-codec";
import { encodeProperty } from "./property-codec";
import type { FilterConfig, InstanceNode, PathRecord, PropertyValue, UnsupportedDiagnostic, WalkResult } from "./types";

export const UNNAMED = "Unnamed";
export const NO_ID = "NoId";

const SKIP_WHEN_EMPTY = new Set(["AttributesSerialize", "Tags"]);

interface WalkState {
  config: FilterConfig;
  processedIds: Set<string>;
  records: PathRecord[];
  diagnostics: UnsupportedDiagnostic[];
}

function isEmptyValue(value: PropertyValue): boolean {
  switch (value.type) {
    case "string":
    case "BinaryString":
    case "ProtectedString":
      return value.value.trim() === "";
    default:
      return false;
  }
}

function compareNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function encodeProperties(node: InstanceNode, path: string, state: WalkState): string[] {
  const encoded: string[] = [];
  const names = Object.keys(node.properties).sort(compareNames);
  for (const name of names) {
    const value = node.properties[name];
    if (SKIP_WHEN_EMPTY.has(name) && isEmptyValue(value)) {
      continue;
    }
    const { lines, unsupported } = encodeProperty(name, value);
    encoded.push(lines.join("\n"));
    for (const tag of unsupported) {
      state.diagnostics.push({ path, property: name, tag });
    }
  }
  return encoded;
}

function walkNode(node: InstanceNode, parentPath: string, state: WalkState): void {
  const { config, processedIds } = state;

  // A class-filtered node is transparent: its children hang off the same parent path.
  if (!includeClass(node.className, config)) {
    for (const child of node.children) {
      walkNode(child, parentPath, state);
    }
    return;
  }

  const name = node.name ?? UNNAMED;
  const id = node.id ?? NO_ID;
  if (processedIds.has(id)) {
    return;
  }

  const currentPath = joinPath(parentPath, encodeSegment(name), name);
  const skipOwnRecord = config.excludeNoIdItems && id === NO_ID;

  if (!skipOwnRecord) {
    processedIds.add(id);
    if (includePath(currentPath, config)) {
      state.records.push({
        path: currentPath,
        id,
        className: node.className,
        properties: encodeProperties(node, currentPath, state)
      });
    }
  }

  // Children are always walked: a descendant may match the whitelist when this node does not.
  for (const child of node.children) {
    walkNode(child, currentPath, state);
  }
}

export function walkTree(roots: InstanceNode[], config: FilterConfig): WalkResult {
  const state: WalkState = {
    config,
    processedIds: new Set<string>(),
    records: [],
    diagnostics: []
  };
  for (const root of roots) {
    walkNode(root, "", state);
  }
  return { records: state.records, diagnostics: state.diagnostics };
}

export function topLevelSegment(path: string): string {
  const [first] = splitPath(path);
  return first ?? "Root";
}

export function groupRecords(records: PathRecord[]): Map<string, PathRecord[]> {
  const grouped = new Map<string, PathRecord[]>();
  for (const record of records) {
    const key = topLevelSegment(record.path);
    const existing = grouped.get(key);
    if (existing) {
      existing.push(record);
    } else {
      grouped.set(key, [record]);
    }
  }
  return grouped;
}
