import fs from "node:fs/promises";
import path from "node:path";
import { countTextLines, ensureDir, getUniqueFileName, sanitizeName, toPosixPath } from "./fs-utils";
import { renderDocument } from "./markdown";
import type { ExportOptions, ExportSummary, PathRecord, RenderOptions } from "./types";
import { groupRecords } from "./walker";

export interface PlannedFile {
  fileName: string;
  group: string;
  content: string;
  recordCount: number;
}

export function planGroupFiles(records: PathRecord[], options: RenderOptions): PlannedFile[] {
  const usedNames = new Set<string>();
  const planned: PlannedFile[] = [];
  for (const [group, groupRecordsList] of groupRecords(records)) {
    if (groupRecordsList.length === 0) {
      continue;
    }
    planned.push({
      fileName: getUniqueFileName(usedNames, sanitizeName(group), ".md"),
      group,
      content: renderDocument(groupRecordsList, options),
      recordCount: groupRecordsList.length
    });
  }
  return planned;
}

export async function exportMarkdown(records: PathRecord[], options: ExportOptions): Promise<ExportSummary> {
  const { output, singleFile } = options;

  if (singleFile) {
    const content = renderDocument(records, options);
    await ensureDir(path.dirname(output));
    await fs.writeFile(output, content, "utf8");
    return {
      files: [toPosixPath(output)],
      recordCount: records.length,
      lineCount: countTextLines(content)
    };
  }

  await ensureDir(output);
  const files: string[] = [];
  let lineCount = 0;
  for (const planned of planGroupFiles(records, options)) {
    const filePath = path.join(output, planned.fileName);
    await fs.writeFile(filePath, planned.content, "utf8");
    files.push(toPosixPath(filePath));
    lineCount += countTextLines(planned.content);
  }

  return { files, recordCount: records.length, lineCount };
}
