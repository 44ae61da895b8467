/**
 * Families command: list the release families protonlink knows about.
 */
import { Command } from "commander";
import { FAMILY_REGISTRY, reservedLinkNames, validateRegistry, type FamilyDescriptor } from "@protonlink/core";

export function formatFamily(family: FamilyDescriptor): string[] {
  return [
    `${family.display.name} (${family.repo}, ${family.archiveFormat})`,
    `  tags:  ${family.grammar.example}`,
    `  links: ${reservedLinkNames(family.id).join(", ")}`,
  ];
}

export const familiesCommand = new Command("families")
  .description("List supported release families and their link names")
  .action(() => {
    for (const family of Object.values(FAMILY_REGISTRY)) {
      for (const line of formatFamily(family)) {
        console.log(line);
      }
    }
    for (const problem of validateRegistry()) {
      console.error(`✗ ${problem}`);
    }
  });
