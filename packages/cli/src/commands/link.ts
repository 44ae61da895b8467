/**
 * Link command: point the link slots at the newest installed releases.
 *
 *   protonlink link
 *   protonlink link --release GE-Proton10-20
 */
import { Command } from "commander";
import type { ReleaseFamily } from "@protonlink/core";
import type { LinkManager, ManageLinksResult } from "../core/link-manager.js";
import { createManager, readGlobalOptions, resolveContext, runAction } from "./context.js";
import { formatLinkResult } from "./format.js";
import { hasChanges } from "../core/symlink-reconciler.js";

export interface LinkOptions {
  root: string;
  family: ReleaseFamily;
  release?: string;
}

export async function runLink(manager: LinkManager, opts: LinkOptions): Promise<ManageLinksResult> {
  return manager.manageLinks(opts.root, opts.family, opts.release);
}

export const linkCommand = new Command("link")
  .description("Point the link slots at the three newest installed releases")
  .option("-r, --release <tag>", "Release that was just installed (must exist in the extract directory)")
  .action(async (options: { release?: string }, command: Command) => {
    await runAction(async () => {
      const ctx = await resolveContext(readGlobalOptions(command.optsWithGlobals()));
      const result = await runLink(createManager(ctx, "link"), { root: ctx.root, family: ctx.family, release: options.release });
      for (const line of formatLinkResult(result)) {
        console.log(line);
      }
      if (!hasChanges(result.outcomes)) {
        console.log("Links already up to date");
      }
      console.log("Success");
    });
  });
