const QUOTE_OPEN = "[\"";
const QUOTE_CLOSE = "\"]";
const NEEDS_QUOTING = /[\s.[\]"\\]/;

export function needsQuoting(name: string): boolean {
  return name.length === 0 || NEEDS_QUOTING.test(name);
}

export function encodeSegment(name: string): string {
  if (!needsQuoting(name)) {
    return name;
  }
  const escaped = name.replace(/[\\"]/g, (ch) => `\\${ch}`);
  return `${QUOTE_OPEN}${escaped}${QUOTE_CLOSE}`;
}

export function joinPath(parentPath: string, segmentText: string, rawName: string): string {
  if (!parentPath) {
    return segmentText;
  }
  // Bracketed segments delimit themselves, so no dot goes in front of them.
  if (needsQuoting(rawName)) {
    return `${parentPath}${segmentText}`;
  }
  return `${parentPath}.${segmentText}`;
}

export function buildPath(names: string[]): string {
  return names.reduce((path, name) => joinPath(path, encodeSegment(name), name), "");
}

interface QuotedToken {
  text: string;
  end: number;
}

// Reads a `["..."]` token starting at `start`; undefined when it never closes.
function readQuoted(path: string, start: number): QuotedToken | undefined {
  let text = "";
  let index = start + QUOTE_OPEN.length;
  while (index < path.length) {
    const ch = path[index];
    if (ch === "\\" && index + 1 < path.length) {
      text += path[index + 1];
      index += 2;
      continue;
    }
    if (path.startsWith(QUOTE_CLOSE, index)) {
      return { text, end: index + QUOTE_CLOSE.length };
    }
    text += ch;
    index += 1;
  }
  return undefined;
}

export function splitPath(path: string): string[] {
  const segments: string[] = [];
  let index = 0;
  while (index < path.length) {
    if (path.startsWith(QUOTE_OPEN, index)) {
      const quoted = readQuoted(path, index);
      if (quoted) {
        segments.push(quoted.text);
        index = quoted.end;
        if (path[index] === ".") {
          index += 1;
        }
        continue;
      }
    }

    // Plain token: runs to the next dot or the next bracketed segment. An
    // unterminated `["` at `index` is read as ordinary characters.
    let end = index;
    while (end < path.length && path[end] !== ".") {
      if (end > index && path.startsWith(QUOTE_OPEN, end) && readQuoted(path, end)) {
        break;
      }
      end += 1;
    }
    segments.push(path.slice(index, end));
    index = end;
    if (path[index] === ".") {
      index += 1;
    }
  }
  return segments;
}

export function leafName(path: string): string {
  const segments = splitPath(path);
  return segments.length > 0 ? segments[segments.length - 1] : path;
}
