import fs from "node:fs/promises";
import { z } from "zod";
import type { FilterConfig } from "./types";

export const DEFAULT_SETTINGS_FILE = "rbxlx2md-settings.json";

export const DEFAULT_FILTER_CONFIG: FilterConfig = {
  pathWhitelist: [],
  pathBlacklist: [],
  classWhitelist: [],
  classBlacklist: [],
  usePathWhitelist: false,
  usePathBlacklist: false,
  useClassWhitelist: false,
  useClassBlacklist: false,
  excludeNoIdItems: false,
  rootToken: "game"
};

/**
 * Shorthand form: `Ignore.ClassName` and `Ignore.Path` become the class and
 * path blacklists with their `use_*` flags switched on.
 */
export const IgnoreSettingsSchema = z.object({
  ClassName: z.array(z.string()).optional(),
  Path: z.array(z.string()).optional()
});

export const SettingsFileSchema = z
  .object({
    Ignore: IgnoreSettingsSchema.optional(),
    path_whitelist: z.array(z.string()).optional(),
    path_blacklist: z.array(z.string()).optional(),
    class_whitelist: z.array(z.string()).optional(),
    class_blacklist: z.array(z.string()).optional(),
    use_path_whitelist: z.boolean().optional(),
    use_path_blacklist: z.boolean().optional(),
    use_class_whitelist: z.boolean().optional(),
    use_class_blacklist: z.boolean().optional(),
    exclude_no_id_items: z.boolean().optional(),
    root_token: z.string().optional()
  })
  .passthrough();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export function normalizeSettings(settings: SettingsFile): FilterConfig {
  const config: FilterConfig = { ...DEFAULT_FILTER_CONFIG };

  if (settings.Ignore?.ClassName) {
    config.classBlacklist = settings.Ignore.ClassName;
    config.useClassBlacklist = true;
  }
  if (settings.Ignore?.Path) {
    config.pathBlacklist = settings.Ignore.Path;
    config.usePathBlacklist = true;
  }

  // Direct keys win over the shorthand.
  config.pathWhitelist = settings.path_whitelist ?? config.pathWhitelist;
  config.pathBlacklist = settings.path_blacklist ?? config.pathBlacklist;
  config.classWhitelist = settings.class_whitelist ?? config.classWhitelist;
  config.classBlacklist = settings.class_blacklist ?? config.classBlacklist;
  config.usePathWhitelist = settings.use_path_whitelist ?? config.usePathWhitelist;
  config.usePathBlacklist = settings.use_path_blacklist ?? config.usePathBlacklist;
  config.useClassWhitelist = settings.use_class_whitelist ?? config.useClassWhitelist;
  config.useClassBlacklist = settings.use_class_blacklist ?? config.useClassBlacklist;
  config.excludeNoIdItems = settings.exclude_no_id_items ?? config.excludeNoIdItems;
  config.rootToken = settings.root_token ?? config.rootToken;
  return config;
}

export function parseSettings(json: string): FilterConfig {
  const raw: unknown = JSON.parse(json);
  return normalizeSettings(SettingsFileSchema.parse(raw));
}

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

export async function loadSettings(settingsFile: string): Promise<FilterConfig> {
  const stat = await fs.stat(settingsFile).catch(() => null);
  if (!stat || !stat.isFile()) {
    console.log(`Settings file ${settingsFile} not found. Using default settings.`);
    return { ...DEFAULT_FILTER_CONFIG };
  }

  try {
    const config = parseSettings(await fs.readFile(settingsFile, "utf8"));
    if (config.useClassBlacklist) {
      console.log(`Using class blacklist: ${config.classBlacklist.join(", ")}`);
    }
    if (config.usePathBlacklist) {
      console.log(`Using path blacklist: ${config.pathBlacklist.join(", ")}`);
    }
    return config;
  } catch (error) {
    console.error(`Error loading settings file ${settingsFile}: ${describeError(error)}. Using default settings.`);
    return { ...DEFAULT_FILTER_CONFIG };
  }
}
