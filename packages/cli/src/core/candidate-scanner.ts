/**
 * Candidate Scanner: turns a release root's directory listing into release
 * candidates for one family.
 *
 * Only real directories count as installed releases. Symlinks (including the
 * family's own link slots) and files are ignored; reserved link names that
 * are occupied by a real directory are NOT filtered out.
 */

import * as path from "node:path";
import {
  ALL_FAMILY_IDS,
  DiscoveryError,
  RootDirectoryError,
  directoryNamesForTag,
  errorMessage,
  isWellFormedTag,
  parseVersion,
  tagFromDirectoryName,
  versionKeysEqual,
  type ReleaseFamily,
  type VersionKey,
} from "@protonlink/core";
import { isNotFound, type FileSystemClient } from "./fs-client.js";
import type { TraceLogger } from "./tracer.js";

// ============================================================================
// Types
// ============================================================================

export interface ReleaseCandidate {
  key: VersionKey;
  /** Absolute or root-relative path of the release directory */
  path: string;
  /** Directory name on disk */
  name: string;
}

export interface ScanOptions {
  fs: FileSystemClient;
  log: TraceLogger;
  /** Release explicitly requested by the caller; must exist on disk */
  manualTag?: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Whether a directory name is a well-formed release of a family other than
 * the one being scanned.
 */
export function belongsToOtherFamily(name: string, family: ReleaseFamily): boolean {
  return ALL_FAMILY_IDS.some(
    (other) => other !== family && isWellFormedTag(tagFromDirectoryName(name, other), other)
  );
}

function preference(candidate: ReleaseCandidate, family: ReleaseFamily): [number, number, string] {
  const prefixed = tagFromDirectoryName(candidate.name, family) !== candidate.name;
  return [prefixed ? 1 : 0, candidate.name.length, candidate.name];
}

function isPreferred(a: ReleaseCandidate, b: ReleaseCandidate, family: ReleaseFamily): boolean {
  const [pa, la, na] = preference(a, family);
  const [pb, lb, nb] = preference(b, family);
  if (pa !== pb) return pa < pb;
  if (la !== lb) return la < lb;
  return na < nb;
}

/**
 * Keep one directory per version: the unprefixed name wins, then the
 * shorter name, then the lexicographically smaller one.
 */
export function dedupeCandidates(
  candidates: ReleaseCandidate[],
  family: ReleaseFamily
): ReleaseCandidate[] {
  const unique: ReleaseCandidate[] = [];
  for (const candidate of candidates) {
    const index = unique.findIndex((kept) => versionKeysEqual(kept.key, candidate.key));
    if (index === -1) {
      unique.push(candidate);
    } else if (isPreferred(candidate, unique[index], family)) {
      unique[index] = candidate;
    }
  }
  return unique;
}

/**
 * A tag must name a single entry directly under the root.
 */
function isPlainEntryName(tag: string): boolean {
  return tag !== "" && tag !== "." && tag !== ".." && path.basename(tag) === tag && !tag.includes("/");
}

/**
 * Find the installed directory of a tag: the literal tag first, then the
 * family's prefixed form. Throws DiscoveryError when neither is a real
 * directory, or when the tag is not a plain directory name.
 */
export async function resolveReleaseDirectory(
  root: string,
  tag: string,
  family: ReleaseFamily,
  fsClient: FileSystemClient
): Promise<string> {
  if (!isPlainEntryName(tag)) {
    throw new DiscoveryError(tag, [], "must be a directory name inside the release root");
  }
  const tried: string[] = [];
  for (const name of directoryNamesForTag(tag, family)) {
    const candidatePath = path.join(root, name);
    tried.push(candidatePath);
    if ((await fsClient.entryKind(candidatePath)) === "directory") {
      return candidatePath;
    }
  }
  throw new DiscoveryError(tag, tried);
}

// ============================================================================
// Scan
// ============================================================================

export async function scanCandidates(
  root: string,
  family: ReleaseFamily,
  opts: ScanOptions
): Promise<ReleaseCandidate[]> {
  const { fs: fsClient, log } = opts;

  let names: string[];
  try {
    names = await fsClient.readDir(root);
  } catch (error) {
    const reason = isNotFound(error) ? "does not exist" : `could not be read: ${errorMessage(error)}`;
    throw new RootDirectoryError(root, reason, { cause: error });
  }

  const found: ReleaseCandidate[] = [];
  for (const name of [...names].sort()) {
    const entryPath = path.join(root, name);
    try {
      if ((await fsClient.entryKind(entryPath)) !== "directory") continue;
    } catch (error) {
      log.debug({ scope: "scan", op: "stat", family, path: entryPath, msg: `Skipping unreadable entry ${name}`, error: errorMessage(error) });
      continue;
    }

    if (belongsToOtherFamily(name, family)) {
      log.debug({ scope: "scan", op: "skip", family, path: entryPath, msg: `Skipping ${name}: belongs to another family` });
      continue;
    }

    found.push({ key: parseVersion(tagFromDirectoryName(name, family), family), path: entryPath, name });
  }

  const candidates = dedupeCandidates(found, family);
  if (candidates.length < found.length) {
    log.info({ scope: "scan", op: "dedupe", family, msg: `Dropped ${found.length - candidates.length} duplicate release director${found.length - candidates.length === 1 ? "y" : "ies"}` });
  }

  if (opts.manualTag !== undefined) {
    const manualPath = await resolveReleaseDirectory(root, opts.manualTag, family, fsClient);
    const name = path.basename(manualPath);
    const key = parseVersion(tagFromDirectoryName(name, family), family);
    const scanned = candidates.some((c) => c.path === manualPath);
    if (scanned) {
      log.debug({ scope: "scan", op: "manual", family, tag: opts.manualTag, path: manualPath, msg: `Manual release ${opts.manualTag} is already a candidate` });
    } else if (candidates.some((c) => versionKeysEqual(c.key, key))) {
      log.debug({ scope: "scan", op: "manual", family, tag: opts.manualTag, path: manualPath, msg: `Manual release ${opts.manualTag} duplicates an installed version` });
    } else {
      candidates.push({ key, path: manualPath, name });
      log.info({ scope: "scan", op: "manual", family, tag: opts.manualTag, path: manualPath, msg: `Added manual release ${opts.manualTag}` });
    }
  }

  log.debug({ scope: "scan", op: "list", family, path: root, msg: `Found ${candidates.length} release candidate(s)`, data: { names: candidates.map((c) => c.name) } });
  return candidates;
}
