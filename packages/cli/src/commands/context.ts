/**
 * Shared command plumbing: global options, config, tracer and error exit.
 */

import * as path from "node:path";
import type { OptionValues } from "commander";
import {
  ProtonLinkError,
  errorMessage,
  expandPath,
  getFamily,
  type ProtonLinkConfig,
  type ReleaseFamily,
} from "@protonlink/core";
import { defaultConfigPath, loadConfig } from "../core/config.js";
import { getTracer } from "../core/global-tracer.js";
import { LinkManager } from "../core/link-manager.js";

// ============================================================================
// Types
// ============================================================================

export interface GlobalOptions {
  extractDir?: string;
  family?: string;
  config?: string;
}

export interface CommandContext {
  root: string;
  family: ReleaseFamily;
  /** True when --family was given explicitly */
  familyExplicit: boolean;
  config: ProtonLinkConfig;
}

// ============================================================================
// Helpers
// ============================================================================

function stringOption(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function readGlobalOptions(values: OptionValues): GlobalOptions {
  return {
    extractDir: stringOption(values.extractDir),
    family: stringOption(values.family),
    config: stringOption(values.config),
  };
}

/**
 * Merge CLI flags over the config file. Flags win.
 */
export async function resolveContext(
  opts: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<CommandContext> {
  const config = await loadConfig(opts.config ?? defaultConfigPath(env), env);
  const family = opts.family !== undefined ? getFamily(opts.family).id : config.family;
  const root = path.resolve(expandPath(opts.extractDir ?? config.extractDir));
  return { root, family, familyExplicit: opts.family !== undefined, config };
}

export function createManager(ctx: CommandContext, cmd: string): LinkManager {
  const tracer = getTracer({ maxRows: ctx.config.traces.maxRows });
  return new LinkManager({ log: tracer.createTrace(cmd) });
}

/**
 * Run a command body. Any failure prints one line and sets exit code 1;
 * errors outside the ProtonLinkError taxonomy also go to the trace log.
 */
export async function runAction(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    if (!(error instanceof ProtonLinkError)) {
      getTracer().createTrace("cli").error({
        scope: "cli",
        op: "run",
        msg: "Command failed",
        error: error instanceof Error ? (error.stack ?? error.message) : String(error),
      });
    }
    console.error(`✗ Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}
