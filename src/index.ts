#!/usr/bin/env node
import path from "node:path";
import fs from "node:fs/promises";
import minimist from "minimist";
import { countLines, ensureDir } from "./fs-utils";
import { exportMarkdown } from "./exporter";
import { importMarkdown } from "./importer";
import { parseRbxlx, RbxlxParseError } from "./parser";
import { serializeRbxlx } from "./serializer";
import { DEFAULT_SETTINGS_FILE, loadSettings } from "./settings";
import { walkTree } from "./walker";

type Command = "to-md" | "to-rbxlx";

interface CliOptions {
  out: string;
  settings: string;
  showClass: boolean;
  singleFile: boolean;
  showProperties: boolean;
}

function printUsage(): void {
  console.log("Usage: rbxlx2md to-md <input.rbxlx> [--out <outputDir>] [--settings <file>] [--show-class] [--single-file] [--no-properties]");
  console.log("       rbxlx2md to-rbxlx <inputDir> [--out <output.rbxlx>]");
}

function isCommand(value: string | undefined): value is Command {
  return value === "to-md" || value === "to-rbxlx";
}

function parseArgs(argv: string[]): { command?: Command; input?: string; options: CliOptions } {
  const args = minimist(argv, {
    boolean: ["show-class", "single-file", "properties"],
    string: ["out", "settings"],
    alias: { o: "out", s: "settings", c: "show-class", f: "single-file" },
    default: {
      "show-class": false,
      "single-file": false,
      properties: true,
      settings: DEFAULT_SETTINGS_FILE
    }
  });

  const [commandArg, input] = args._.map(String);
  return {
    command: isCommand(commandArg) ? commandArg : undefined,
    input,
    options: {
      out: args.out ? String(args.out) : "",
      settings: String(args.settings),
      showClass: Boolean(args["show-class"]),
      singleFile: Boolean(args["single-file"]),
      showProperties: Boolean(args.properties)
    }
  };
}

async function ensureInputFile(inputPath: string): Promise<boolean> {
  const stat = await fs.stat(inputPath).catch(() => null);
  return Boolean(stat && stat.isFile());
}

async function ensureInputDir(inputPath: string): Promise<boolean> {
  const stat = await fs.stat(inputPath).catch(() => null);
  return Boolean(stat && stat.isDirectory());
}

async function runToMarkdown(input: string, options: CliOptions): Promise<void> {
  const inputPath = path.resolve(process.cwd(), input);
  if (!(await ensureInputFile(inputPath))) {
    console.error(`Input file not found: ${inputPath}`);
    process.exit(1);
  }
  const defaultOut = path.basename(inputPath, path.extname(inputPath));
  const output = path.resolve(process.cwd(), options.out || defaultOut);

  const config = await loadSettings(path.resolve(process.cwd(), options.settings));
  const parsed = await parseRbxlx(inputPath);
  const { records, diagnostics } = walkTree(parsed.items, config);

  for (const diagnostic of diagnostics) {
    console.warn(
      `WARNING: Unsupported property type '${diagnostic.tag}' for property '${diagnostic.property}' at ${diagnostic.path}.`
    );
  }

  const summary = await exportMarkdown(records, {
    output,
    singleFile: options.singleFile,
    showClass: options.showClass,
    showProperties: options.showProperties
  });

  if (options.singleFile) {
    console.log(`Successfully wrote ${summary.recordCount} item paths to ${output}`);
  } else {
    console.log(
      `Successfully wrote ${summary.recordCount} item paths across ${summary.files.length} files in the ${output} directory`
    );
  }

  const inputLines = await countLines(inputPath);
  if (inputLines > 0) {
    const reduction = inputLines - summary.lineCount;
    const percentage = ((reduction / inputLines) * 100).toFixed(2);
    console.log(`Input XML: ${inputLines} lines, Output: ${summary.lineCount} lines`);
    console.log(`Reduced by ${reduction} lines (${percentage}%)`);
  }
}

async function runToRbxlx(input: string, options: CliOptions): Promise<void> {
  const inputDir = path.resolve(process.cwd(), input);
  if (!(await ensureInputDir(inputDir))) {
    console.error(`Input directory not found: ${inputDir}`);
    process.exit(1);
  }
  const output = path.resolve(process.cwd(), options.out || "output.rbxlx");

  const result = await importMarkdown(inputDir);
  if (result.files.length === 0) {
    console.log(`No markdown files found in ${inputDir}`);
    return;
  }

  await ensureDir(path.dirname(output));
  await fs.writeFile(output, serializeRbxlx(result.items), "utf8");
  console.log(`Successfully wrote ${result.records.length} items to ${output}`);
}

async function run(): Promise<void> {
  const { command, input, options } = parseArgs(process.argv.slice(2));
  if (!command || !input) {
    printUsage();
    process.exit(1);
  }

  if (command === "to-md") {
    await runToMarkdown(input, options);
  } else {
    await runToRbxlx(input, options);
  }
}

run().catch((error: unknown) => {
  if (error instanceof RbxlxParseError) {
    console.error(`Error parsing XML file: ${error.message}`);
  } else {
    console.error("rbxlx2md failed:", error);
  }
  process.exit(1);
});
