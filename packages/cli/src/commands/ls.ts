/**
 * Ls command: show where each link slot points.
 *
 * protonlink ls                : every family
 * protonlink --family <id> ls  : one family
 */
import { Command } from "commander";
import { ALL_FAMILY_IDS, contractPath, type ReleaseFamily } from "@protonlink/core";
import type { LinkListing, LinkManager } from "../core/link-manager.js";
import { createManager, readGlobalOptions, resolveContext, runAction } from "./context.js";

export interface FamilyListing {
  family: ReleaseFamily;
  links: LinkListing;
}

export async function listFamilyLinks(
  manager: LinkManager,
  root: string,
  families: readonly ReleaseFamily[]
): Promise<FamilyListing[]> {
  const results: FamilyListing[] = [];
  for (const family of families) {
    results.push({ family, links: await manager.listLinks(root, family) });
  }
  return results;
}

export function formatFamilyLinks(entries: readonly FamilyListing[]): string[] {
  const lines: string[] = [];
  for (const { family, links } of entries) {
    lines.push(`Links for ${family}:`);
    for (const [linkName, target] of Object.entries(links)) {
      lines.push(`  ${linkName} -> ${target === null ? "(not found)" : contractPath(target)}`);
    }
  }
  return lines;
}

export const lsCommand = new Command("ls")
  .description("List the link slots and the release directories they point to")
  .action(async (_options: unknown, command: Command) => {
    await runAction(async () => {
      const ctx = await resolveContext(readGlobalOptions(command.optsWithGlobals()));
      const families = ctx.familyExplicit ? [ctx.family] : ALL_FAMILY_IDS;
      const entries = await listFamilyLinks(createManager(ctx, "ls"), ctx.root, families);
      for (const line of formatFamilyLinks(entries)) {
        console.log(line);
      }
      console.log("Success");
    });
  });
