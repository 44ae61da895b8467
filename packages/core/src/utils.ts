/**
 * Utility functions for protonlink
 */

import * as os from "node:os";
import * as path from "node:path";

/**
 * Expand ~ to home directory in path
 */
export function expandPath(p: string): string {
  if (p === "~" || p.startsWith("~/")) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

/**
 * Contract home directory to ~ in path
 */
export function contractPath(p: string): string {
  const home = os.homedir();
  if (p === home || p.startsWith(home + path.sep)) {
    return "~" + p.slice(home.length);
  }
  return p;
}

/**
 * Get the global protonlink directory path
 */
export function getProtonLinkHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.PROTONLINK_HOME ? expandPath(env.PROTONLINK_HOME) : expandPath("~/.protonlink");
}

/**
 * Resolve environment variables in a string (e.g., ${VAR_NAME})
 */
export function resolveEnvVars(
  str: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] ?? "";
  });
}

/**
 * Resolve environment variables in an object recursively
 */
export function resolveEnvVarsInObject(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === "string") {
    return resolveEnvVars(obj, env);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVarsInObject(item, env));
  }

  if (typeof obj === "object" && obj !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVarsInObject(value, env);
    }
    return result;
  }

  return obj;
}

/**
 * Whether `child` is `parent` itself or lies somewhere beneath it
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}
