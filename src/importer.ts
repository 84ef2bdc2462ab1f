import fs from "node:fs/promises";
import { TreeBuilder } from "./builder";
import type { TreeBuilderOptions } from "./builder";
import { collectFiles } from "./fs-utils";
import { parseDocument } from "./markdown";
import type { InstanceNode, PathRecord } from "./types";

export interface ImportResult {
  files: string[];
  records: PathRecord[];
  items: InstanceNode[];
}

export function buildTree(records: PathRecord[], options: TreeBuilderOptions = {}): InstanceNode[] {
  const builder = new TreeBuilder(options);
  builder.insertAll(records);
  return builder.build();
}

export async function importMarkdown(inputDir: string, options: TreeBuilderOptions = {}): Promise<ImportResult> {
  const files = await collectFiles(inputDir, ".md");
  const records: PathRecord[] = [];
  for (const file of files) {
    const text = await fs.readFile(file, "utf8");
    records.push(...parseDocument(text));
  }
  return { files, records, items: buildTree(records, options) };
}
