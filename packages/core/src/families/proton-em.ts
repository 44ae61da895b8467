import type { FamilyDescriptor } from "./_types.js";

export const protonEm: FamilyDescriptor = {
  id: "Proton-EM",
  display: { name: "Proton-EM" },
  repo: "Etaash-mathamsetty/Proton",
  archiveFormat: ".tar.xz",
  grammar: {
    prefix: "EM",
    pattern: /^EM-(\d+)\.(\d+)-(\d+)$/,
    fields: [1, 2, 3],
    example: "EM-10.0-30",
  },
  // Archives unpack to proton-EM-<version>
  directoryPrefix: "proton-",
  links: {
    primary: "Proton-EM",
    fallback: "Proton-EM-Fallback",
    fallback2: "Proton-EM-Fallback2",
  },
};
