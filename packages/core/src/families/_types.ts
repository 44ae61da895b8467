/**
 * Release Family Types: defines the FamilyDescriptor interface and related types.
 */

export const FAMILY_IDS = ["GE-Proton", "Proton-EM"] as const;

export type ReleaseFamily = (typeof FAMILY_IDS)[number];

export type LinkSlot = "primary" | "fallback" | "fallback2";

export const LINK_SLOTS: readonly LinkSlot[] = ["primary", "fallback", "fallback2"];

export interface TagGrammar {
  /** Constant first element of every well-formed VersionKey of the family */
  prefix: string;
  /** Full-string match; capture groups are the numeric fields in order */
  pattern: RegExp;
  /** Which VersionKey positions the captures fill (1 = major, 2 = minor, 3 = patch) */
  fields: readonly (1 | 2 | 3)[];
  /** Example tag, used in help text */
  example: string;
}

export interface FamilyLinks {
  primary: string;
  fallback: string;
  fallback2: string;
}

export interface FamilyDescriptor {
  id: ReleaseFamily;
  display: { name: string };
  repo: string;
  archiveFormat: ".tar.gz" | ".tar.xz";
  grammar: TagGrammar;
  /** Literal prefix the extracted directory carries in front of the tag, if any */
  directoryPrefix: string | null;
  links: FamilyLinks;
}
