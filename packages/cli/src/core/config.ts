/**
 * Config loader: ~/.protonlink/config.yaml
 *
 * A missing file means defaults. String values may use ${VAR} placeholders
 * and a leading ~.
 */

import * as path from "node:path";
import { parse as yamlParse } from "yaml";
import {
  ConfigError,
  configSchema,
  errorMessage,
  expandPath,
  getProtonLinkHome,
  resolveEnvVarsInObject,
  type ProtonLinkConfig,
} from "@protonlink/core";
import { readFileIfExists } from "./fs-helpers.js";

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getProtonLinkHome(env), "config.yaml");
}

export async function loadConfig(
  configPath: string = defaultConfigPath(),
  env: NodeJS.ProcessEnv = process.env
): Promise<ProtonLinkConfig> {
  const content = await readFileIfExists(configPath);
  if (content === null) {
    const defaults = configSchema.parse({});
    return { ...defaults, extractDir: expandPath(defaults.extractDir) };
  }

  let raw: unknown;
  try {
    raw = yamlParse(content);
  } catch (error) {
    throw new ConfigError(configPath, [errorMessage(error)]);
  }

  const parsed = configSchema.safeParse(resolveEnvVarsInObject(raw ?? {}, env));
  if (!parsed.success) {
    throw new ConfigError(
      configPath,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return { ...parsed.data, extractDir: expandPath(parsed.data.extractDir) };
}
