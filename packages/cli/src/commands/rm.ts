/**
 * Rm command: delete one installed release and relink the family.
 */
import { Command } from "commander";
import { contractPath } from "@protonlink/core";
import type { RemoveReleaseResult } from "../core/link-manager.js";
import { createManager, readGlobalOptions, resolveContext, runAction } from "./context.js";
import { formatOutcome } from "./format.js";

export function formatRemoveResult(result: RemoveReleaseResult): string[] {
  const lines = [`✓ Removed ${contractPath(result.removedPath)}`];
  for (const linkName of result.unlinked) {
    lines.push(`✓ Unlinked ${linkName}`);
  }
  lines.push(...result.links.outcomes.map(formatOutcome));
  return lines;
}

export const rmCommand = new Command("rm")
  .description("Remove an installed release directory and relink")
  .argument("<tag>", "Release tag to remove (e.g. GE-Proton10-20 or EM-10.0-30)")
  .action(async (tag: string, _options: unknown, command: Command) => {
    await runAction(async () => {
      const ctx = await resolveContext(readGlobalOptions(command.optsWithGlobals()));
      const result = await createManager(ctx, "rm").removeRelease(ctx.root, tag, ctx.family);
      for (const line of formatRemoveResult(result)) {
        console.log(line);
      }
      console.log("Success");
    });
  });
