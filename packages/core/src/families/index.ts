export type { FamilyDescriptor, FamilyLinks, LinkSlot, ReleaseFamily, TagGrammar } from "./_types.js";
export { FAMILY_IDS, LINK_SLOTS } from "./_types.js";
export {
  FAMILY_REGISTRY,
  ALL_FAMILY_IDS,
  DEFAULT_FAMILY,
  isReleaseFamily,
  getFamily,
  linkNameFor,
  reservedLinkNames,
  tagFromDirectoryName,
  directoryNamesForTag,
  validateRegistry,
} from "./_registry.js";
