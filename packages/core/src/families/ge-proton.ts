import type { FamilyDescriptor } from "./_types.js";

export const geProton: FamilyDescriptor = {
  id: "GE-Proton",
  display: { name: "GE-Proton" },
  repo: "GloriousEggroll/proton-ge-custom",
  archiveFormat: ".tar.gz",
  grammar: {
    prefix: "GE-Proton",
    pattern: /^GE-Proton(\d+)-(\d+)$/,
    fields: [1, 3],
    example: "GE-Proton10-20",
  },
  directoryPrefix: null,
  links: {
    primary: "GE-Proton",
    fallback: "GE-Proton-Fallback",
    fallback2: "GE-Proton-Fallback2",
  },
};
