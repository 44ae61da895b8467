/**
 * Error taxonomy shared by the core and the CLI.
 *
 * Only conditions the caller has to act on are thrown. Per-slot link failures
 * are reported as values by the reconciler, never as exceptions.
 */

export type ProtonLinkErrorCode =
  | "DISCOVERY"
  | "NO_CANDIDATES"
  | "ROOT_DIRECTORY"
  | "RELEASE_REMOVAL"
  | "RELEASE_FAMILY"
  | "CONFIG";

export class ProtonLinkError extends Error {
  constructor(
    message: string,
    public readonly code: ProtonLinkErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProtonLinkError";
  }
}

/**
 * A release tag could not be matched to an installed directory under any of
 * the family's naming conventions.
 */
export class DiscoveryError extends ProtonLinkError {
  constructor(
    public readonly tag: string,
    public readonly triedPaths: string[],
    reason?: string
  ) {
    super(
      reason === undefined
        ? `Release directory not found for ${tag}: ${triedPaths.join(" or ")}`
        : `Invalid release tag ${JSON.stringify(tag)}: ${reason}`,
      "DISCOVERY"
    );
    this.name = "DiscoveryError";
  }
}

/**
 * Raised by operations that need at least one installed release.
 */
export class NoCandidatesError extends ProtonLinkError {
  constructor(
    public readonly family: string,
    public readonly root: string
  ) {
    super(`No installed ${family} releases found in ${root}`, "NO_CANDIDATES");
    this.name = "NoCandidatesError";
  }
}

/**
 * The release root itself is missing, not a directory, or not usable.
 */
export class RootDirectoryError extends ProtonLinkError {
  constructor(
    public readonly root: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Release root ${root} ${reason}`, "ROOT_DIRECTORY", options);
    this.name = "RootDirectoryError";
  }
}

/**
 * An installed release directory was found but could not be deleted.
 */
export class ReleaseRemovalError extends ProtonLinkError {
  constructor(
    public readonly releasePath: string,
    cause: unknown
  ) {
    super(`Failed to remove release directory ${releasePath}: ${errorMessage(cause)}`, "RELEASE_REMOVAL", { cause });
    this.name = "ReleaseRemovalError";
  }
}

export class ReleaseFamilyError extends ProtonLinkError {
  constructor(id: string, known: readonly string[]) {
    super(`Unknown release family: ${id} (available: ${known.join(", ")})`, "RELEASE_FAMILY");
    this.name = "ReleaseFamilyError";
  }
}

export class ConfigError extends ProtonLinkError {
  constructor(
    public readonly configPath: string,
    public readonly issues: string[]
  ) {
    super(`Invalid config ${configPath}: ${issues.join("; ")}`, "CONFIG");
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
