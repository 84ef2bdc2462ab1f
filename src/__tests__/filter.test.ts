import { describe, expect, it } from "vitest";
import { includeClass, includePath, isPathUnder, normalizePattern } from "../filter";
import { DEFAULT_FILTER_CONFIG } from "../settings";
import type { FilterConfig } from "../types";

function makeConfig(overrides: Partial<FilterConfig> = {}): FilterConfig {
  return { ...DEFAULT_FILTER_CONFIG, ...overrides };
}

describe("includeClass", () => {
  it("accepts everything without active lists", () => {
    expect(includeClass("Script", makeConfig({ classBlacklist: ["Script"] }))).toBe(true);
  });

  it("rejects blacklisted classes", () => {
    const config = makeConfig({ classBlacklist: ["Script"], useClassBlacklist: true });
    expect(includeClass("Script", config)).toBe(false);
    expect(includeClass("Part", config)).toBe(true);
  });

  it("requires whitelisted classes only when the whitelist is non-empty", () => {
    expect(includeClass("Model", makeConfig({ classWhitelist: ["Part"], useClassWhitelist: true }))).toBe(false);
    expect(includeClass("Model", makeConfig({ classWhitelist: [], useClassWhitelist: true }))).toBe(true);
  });
});

describe("normalizePattern", () => {
  it("strips the root token prefix", () => {
    expect(normalizePattern("game.Lighting", makeConfig())).toBe("Lighting");
    expect(normalizePattern("gameplay.Lighting", makeConfig())).toBe("gameplay.Lighting");
  });
});

describe("isPathUnder", () => {
  it("matches the path itself and dot-descendants", () => {
    expect(isPathUnder("Workspace", "Workspace")).toBe(true);
    expect(isPathUnder("Workspace.Baseplate", "Workspace")).toBe(true);
    expect(isPathUnder("WorkspaceExtra", "Workspace")).toBe(false);
  });

  it("anchors wildcard patterns at both ends", () => {
    expect(isPathUnder("Workspace.Map.Scripts", "Workspace.*.Scripts")).toBe(true);
    expect(isPathUnder("Workspace.Map.Scripts.Main", "Workspace.*.Scripts")).toBe(false);
    expect(isPathUnder("WorkspaceXMapXScripts", "Workspace.*.Scripts")).toBe(false);
  });

  it("does not cover bracketed children of a plain pattern", () => {
    // Bracketed segments join without a dot, so only wildcards reach them.
    expect(isPathUnder('Workspace.Map["Spawn Point"]', "Workspace.Map")).toBe(false);
    expect(isPathUnder('Workspace.Map["Spawn Point"]', "Workspace.Map*")).toBe(true);
  });

  it("treats other regex characters literally", () => {
    expect(isPathUnder('Workspace["A (1)"]', 'Workspace["A (*)"]')).toBe(true);
  });
});

describe("includePath", () => {
  it("requires a whitelist match when the whitelist is active", () => {
    const config = makeConfig({ pathWhitelist: ["game.Workspace"], usePathWhitelist: true });
    expect(includePath("Workspace.Baseplate", config)).toBe(true);
    expect(includePath("Lighting", config)).toBe(false);
  });

  it("rejects blacklisted paths", () => {
    const config = makeConfig({ pathBlacklist: ["Workspace.Debris"], usePathBlacklist: true });
    expect(includePath("Workspace.Debris.Rock", config)).toBe(false);
    expect(includePath("Workspace.Baseplate", config)).toBe(true);
  });

  it("applies the blacklist after the whitelist", () => {
    const config = makeConfig({
      pathWhitelist: ["Workspace"],
      usePathWhitelist: true,
      pathBlacklist: ["Workspace.Debris"],
      usePathBlacklist: true
    });
    expect(includePath("Workspace.Debris", config)).toBe(false);
    expect(includePath("Workspace.Map", config)).toBe(true);
  });

  it("gives the same verdict on repeated calls", () => {
    const config = makeConfig({ pathWhitelist: ["Workspace.*"], usePathWhitelist: true });
    const first = includePath("Workspace.Map", config);
    expect(first).toBe(true);
    expect(includePath("Workspace.Map", config)).toBe(first);
  });
});
