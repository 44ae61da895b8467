/**
 * Relink command: rebuild the links from installed releases only.
 */
import { Command } from "commander";
import { createManager, readGlobalOptions, resolveContext, runAction } from "./context.js";
import { formatLinkResult } from "./format.js";
import { hasChanges } from "../core/symlink-reconciler.js";

export const relinkCommand = new Command("relink")
  .description("Recreate the link slots from installed releases (fails if none are installed)")
  .action(async (_options: unknown, command: Command) => {
    await runAction(async () => {
      const ctx = await resolveContext(readGlobalOptions(command.optsWithGlobals()));
      const result = await createManager(ctx, "relink").relink(ctx.root, ctx.family);
      for (const line of formatLinkResult(result)) {
        console.log(line);
      }
      if (!hasChanges(result.outcomes)) {
        console.log("Links already up to date");
      }
      console.log("Success");
    });
  });
