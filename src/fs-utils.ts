import fs from "node:fs/promises";
import path from "node:path";

const INVALID_CHARS = /[\\/:*?"<>|]/g;

export function sanitizeName(value: string): string {
  const trimmed = value.trim().replace(INVALID_CHARS, "_");
  const cleaned = trimmed.replace(/\s+/g, " ");
  if (!cleaned) {
    return "Root";
  }
  return cleaned;
}

export function getUniqueFileName(used: Set<string>, baseName: string, extension: string): string {
  let candidate = `${baseName}${extension}`;
  let counter = 2;
  // Case-insensitive file systems would merge "Workspace.md" and "workspace.md".
  while (used.has(candidate.toLowerCase())) {
    candidate = `${baseName}_${counter}${extension}`;
    counter += 1;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}

export function toPosixPath(targetPath: string): string {
  return targetPath.split(path.sep).join(path.posix.sep);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function collectFiles(rootDir: string, extension: string): Promise<string[]> {
  const files: string[] = [];
  const stack: string[] = [rootDir];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) {
      continue;
    }
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        stack.push(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        files.push(fullPath);
      }
    }
  }
  return files.sort();
}

export async function countLines(filePath: string): Promise<number> {
  const content = await fs.readFile(filePath, "utf8");
  return countTextLines(content);
}

export function countTextLines(content: string): number {
  if (!content) {
    return 0;
  }
  const lines = content.split("\n").length;
  return content.endsWith("\n") ? lines - 1 : lines;
}
