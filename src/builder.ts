import { randomBytes } from "node:crypto";
import { buildPath, splitPath } from "./path-codec";
import { decodeProperty } from "./property-codec";
import type { InstanceNode, PathRecord, PropertyValue } from "./types";

export const PLACEHOLDER_CLASS = "Folder";

export interface TreeBuilderOptions {
  generateId?: () => string;
}

interface BuilderEntry {
  node: InstanceNode;
  placeholder: boolean;
}

function defaultGenerateId(): string {
  return randomBytes(16).toString("hex");
}

export function decodeProperties(lines: string[]): Record<string, PropertyValue> {
  const properties: Record<string, PropertyValue> = {};
  for (const line of lines) {
    const decoded = decodeProperty(line);
    if (decoded) {
      properties[decoded.name] = decoded.value;
    }
  }
  return properties;
}

/**
 * Rebuilds an instance tree from path records in any order.
 *
 * Intermediate segments without a record of their own become `Folder`
 * placeholders; a record arriving later for the same path completes the
 * placeholder in place instead of adding a second node.
 */
export class TreeBuilder {
  private readonly roots: InstanceNode[] = [];
  private readonly entries = new Map<string, BuilderEntry>();
  private readonly generateId: () => string;

  constructor(options: TreeBuilderOptions = {}) {
    this.generateId = options.generateId ?? defaultGenerateId;
  }

  insert(record: PathRecord): InstanceNode {
    const segments = splitPath(record.path);
    if (segments.length === 0) {
      segments.push(record.path);
    }

    let siblings = this.roots;
    for (let depth = 0; depth < segments.length - 1; depth += 1) {
      const entry = this.resolve(segments.slice(0, depth + 1), siblings);
      siblings = entry.node.children;
    }

    const key = buildPath(segments);
    const properties = decodeProperties(record.properties);
    const existing = this.entries.get(key);

    if (existing && (existing.placeholder || existing.node.id === record.id)) {
      existing.node.id = record.id;
      existing.node.className = record.className;
      existing.node.properties = properties;
      existing.placeholder = false;
      return existing.node;
    }

    const node: InstanceNode = {
      id: record.id,
      name: segments[segments.length - 1],
      className: record.className,
      properties,
      children: []
    };
    siblings.push(node);
    // Same-named siblings share a path; descendants attach to the first one.
    if (!existing) {
      this.entries.set(key, { node, placeholder: false });
    }
    return node;
  }

  insertAll(records: Iterable<PathRecord>): void {
    for (const record of records) {
      this.insert(record);
    }
  }

  build(): InstanceNode[] {
    return this.roots;
  }

  private resolve(segments: string[], siblings: InstanceNode[]): BuilderEntry {
    const key = buildPath(segments);
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }
    const node: InstanceNode = {
      id: this.generateId(),
      name: segments[segments.length - 1],
      className: PLACEHOLDER_CLASS,
      properties: {},
      children: []
    };
    siblings.push(node);
    const entry = { node, placeholder: true };
    this.entries.set(key, entry);
    return entry;
  }
}
