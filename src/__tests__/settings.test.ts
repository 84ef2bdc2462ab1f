import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import { DEFAULT_FILTER_CONFIG, loadSettings, normalizeSettings, parseSettings } from "../settings";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("normalizeSettings", () => {
  it("maps the Ignore shorthand onto the blacklists", () => {
    expect(normalizeSettings({ Ignore: { ClassName: ["Script"], Path: ["Workspace.Debris"] } })).toEqual({
      ...DEFAULT_FILTER_CONFIG,
      classBlacklist: ["Script"],
      useClassBlacklist: true,
      pathBlacklist: ["Workspace.Debris"],
      usePathBlacklist: true
    });
  });

  it("lets direct keys override the shorthand", () => {
    const config = normalizeSettings({
      Ignore: { ClassName: ["Script"] },
      class_blacklist: ["Sound"],
      use_class_blacklist: false
    });
    expect(config.classBlacklist).toEqual(["Sound"]);
    expect(config.useClassBlacklist).toBe(false);
  });
});

describe("parseSettings", () => {
  it("reads snake_case keys", () => {
    const config = parseSettings(
      JSON.stringify({ path_whitelist: ["place.Workspace"], use_path_whitelist: true, root_token: "place" })
    );
    expect(config).toEqual({
      ...DEFAULT_FILTER_CONFIG,
      pathWhitelist: ["place.Workspace"],
      usePathWhitelist: true,
      rootToken: "place"
    });
  });

  it("rejects values of the wrong type", () => {
    expect(() => parseSettings(JSON.stringify({ use_path_whitelist: "yes" }))).toThrow(ZodError);
  });
});

describe("loadSettings", () => {
  it("falls back to defaults when the file is missing", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const missing = path.join(os.tmpdir(), "rbxlx2md-missing-settings.json");
    await expect(loadSettings(missing)).resolves.toEqual(DEFAULT_FILTER_CONFIG);
    expect(log).toHaveBeenCalledWith(`Settings file ${missing} not found. Using default settings.`);
  });

  it("falls back to defaults when the file is invalid", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "rbxlx2md-settings-"));
    const file = path.join(dir, "settings.json");
    await fs.writeFile(file, JSON.stringify({ Ignore: { ClassName: "Script" } }), "utf8");
    try {
      await expect(loadSettings(file)).resolves.toEqual(DEFAULT_FILTER_CONFIG);
      expect(error).toHaveBeenCalledTimes(1);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("reports the active blacklists", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "rbxlx2md-settings-"));
    const file = path.join(dir, "settings.json");
    await fs.writeFile(file, JSON.stringify({ Ignore: { ClassName: ["Script", "Sound"] } }), "utf8");
    try {
      const config = await loadSettings(file);
      expect(config.classBlacklist).toEqual(["Script", "Sound"]);
      expect(log).toHaveBeenCalledWith("Using class blacklist: Script, Sound");
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
