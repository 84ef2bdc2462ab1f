import type { FilterConfig } from "./types";

const REGEX_SPECIAL = /[.+?^${}()|[\]\\]/g;

export function includeClass(className: string, config: FilterConfig): boolean {
  if (config.useClassWhitelist && config.classWhitelist.length > 0) {
    if (!config.classWhitelist.includes(className)) {
      return false;
    }
  }
  if (config.useClassBlacklist && config.classBlacklist.length > 0) {
    if (config.classBlacklist.includes(className)) {
      return false;
    }
  }
  return true;
}

export function normalizePattern(pattern: string, config: FilterConfig): string {
  const prefix = `${config.rootToken}.`;
  return config.rootToken && pattern.startsWith(prefix) ? pattern.slice(prefix.length) : pattern;
}

function wildcardToRegExp(pattern: string): RegExp {
  const body = pattern
    .split("*")
    .map((part) => part.replace(REGEX_SPECIAL, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}$`);
}

export function isPathUnder(path: string, pattern: string): boolean {
  if (pattern.includes("*")) {
    return wildcardToRegExp(pattern).test(path);
  }
  return path === pattern || path.startsWith(`${pattern}.`);
}

export function includePath(path: string, config: FilterConfig): boolean {
  if (config.usePathWhitelist && config.pathWhitelist.length > 0) {
    const allowed = config.pathWhitelist.some((pattern) => isPathUnder(path, normalizePattern(pattern, config)));
    if (!allowed) {
      return false;
    }
  }
  if (config.usePathBlacklist && config.pathBlacklist.length > 0) {
    const blocked = config.pathBlacklist.some((pattern) => isPathUnder(path, normalizePattern(pattern, config)));
    if (blocked) {
      return false;
    }
  }
  return true;
}
