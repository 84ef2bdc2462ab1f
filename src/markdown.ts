import type { PathRecord, RenderOptions } from "./types";

export const DEFAULT_CLASS = "Part";

// `<path> (<id>)` with an optional ` [<class>]`; the path itself may contain parentheses.
const HEADER = /^(.+?)\s*\(([^()]+)\)(?:\s*\[([^\]]+)\])?$/;

export interface RecordHeader {
  path: string;
  id: string;
  className?: string;
}

export function formatHeader(record: PathRecord, showClass: boolean): string {
  const base = `${record.path} (${record.id})`;
  return showClass ? `${base} [${record.className}]` : base;
}

export function formatRecord(record: PathRecord, options: RenderOptions): string {
  const lines = [formatHeader(record, options.showClass)];
  if (options.showProperties) {
    lines.push(...record.properties);
  }
  return lines.join("\n");
}

export function compareRecords(a: PathRecord, b: PathRecord): number {
  if (a.path !== b.path) {
    return a.path < b.path ? -1 : 1;
  }
  if (a.id !== b.id) {
    return a.id < b.id ? -1 : 1;
  }
  return 0;
}

export function renderDocument(records: PathRecord[], options: RenderOptions): string {
  if (records.length === 0) {
    return "";
  }
  const blocks = [...records].sort(compareRecords).map((record) => formatRecord(record, options));
  return `${blocks.join("\n\n")}\n`;
}

export function parseHeader(line: string): RecordHeader | undefined {
  const match = HEADER.exec(line.trim());
  if (!match) {
    return undefined;
  }
  const [, path, id, className] = match;
  return {
    path: path.trim(),
    id: id.trim(),
    className: className ? className.trim() : undefined
  };
}

function isPropertyLine(line: string): boolean {
  return line.startsWith("- ") || line.startsWith("  ");
}

export function parseDocument(text: string): PathRecord[] {
  const records: PathRecord[] = [];
  let current: PathRecord | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (!line) {
      current = undefined;
      continue;
    }

    if (isPropertyLine(line)) {
      if (!current) {
        continue;
      }
      // Indented lines belong to the property above them.
      if (line.startsWith("  ") && current.properties.length > 0) {
        const last = current.properties.length - 1;
        current.properties[last] = `${current.properties[last]}\n${line}`;
      } else if (line.startsWith("- ")) {
        current.properties.push(line);
      }
      continue;
    }

    const header = parseHeader(line);
    if (header) {
      current = {
        path: header.path,
        id: header.id,
        className: header.className ?? DEFAULT_CLASS,
        properties: []
      };
      records.push(current);
    }
  }

  return records;
}
