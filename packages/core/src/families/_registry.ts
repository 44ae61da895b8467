import type { FamilyDescriptor, LinkSlot, ReleaseFamily } from "./_types.js";
import { FAMILY_IDS, LINK_SLOTS } from "./_types.js";
import { geProton } from "./ge-proton.js";
import { protonEm } from "./proton-em.js";
import { ReleaseFamilyError } from "../errors.js";

export const FAMILY_REGISTRY: Record<ReleaseFamily, FamilyDescriptor> = {
  "GE-Proton": geProton,
  "Proton-EM": protonEm,
};

export const ALL_FAMILY_IDS: ReleaseFamily[] = [...FAMILY_IDS];
export const DEFAULT_FAMILY: ReleaseFamily = "GE-Proton";

export function isReleaseFamily(id: string): id is ReleaseFamily {
  return ALL_FAMILY_IDS.some((family) => family === id);
}

export function getFamily(id: string): FamilyDescriptor {
  if (!isReleaseFamily(id)) {
    throw new ReleaseFamilyError(id, ALL_FAMILY_IDS);
  }
  return FAMILY_REGISTRY[id];
}

export function linkNameFor(family: ReleaseFamily, slot: LinkSlot): string {
  return FAMILY_REGISTRY[family].links[slot];
}

/** The three reserved link names of a family, in slot order */
export function reservedLinkNames(family: ReleaseFamily): string[] {
  return LINK_SLOTS.map((slot) => linkNameFor(family, slot));
}

/**
 * Tag a directory name carries once the family's on-disk prefix is removed.
 */
export function tagFromDirectoryName(name: string, family: ReleaseFamily): string {
  const prefix = FAMILY_REGISTRY[family].directoryPrefix;
  if (prefix && name.startsWith(prefix)) {
    return name.slice(prefix.length);
  }
  return name;
}

/**
 * Directory names a release tag may have been unpacked under, in lookup order.
 */
export function directoryNamesForTag(tag: string, family: ReleaseFamily): string[] {
  const prefix = FAMILY_REGISTRY[family].directoryPrefix;
  return prefix ? [tag, `${prefix}${tag}`] : [tag];
}

export function validateRegistry(): string[] {
  const errors: string[] = [];
  const owners = new Map<string, ReleaseFamily>();
  for (const family of Object.values(FAMILY_REGISTRY)) {
    for (const name of reservedLinkNames(family.id)) {
      const owner = owners.get(name);
      if (owner) {
        errors.push(`${family.id} and ${owner} share link name: ${name}`);
      }
      owners.set(name, family.id);
    }
    if (family.grammar.fields.length === 0) {
      errors.push(`${family.id} grammar captures no numeric fields`);
    }
  }
  return errors;
}
