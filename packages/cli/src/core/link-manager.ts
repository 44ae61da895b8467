/**
 * Link Manager: the one entry point the CLI uses for a release root.
 *
 * Every call re-derives state from the filesystem: scan → plan → reconcile.
 * Nothing is cached between calls.
 * There is no locking; two processes working on the same root at once can
 * interleave their changes.
 */

import * as path from "node:path";
import {
  LINK_SLOTS,
  NoCandidatesError,
  ReleaseRemovalError,
  errorMessage,
  formatVersionKey,
  linkNameFor,
  type ReleaseFamily,
} from "@protonlink/core";
import { nodeFileSystem, type FileSystemClient } from "./fs-client.js";
import { ensureWritableDirectory } from "./fs-helpers.js";
import { resolveReleaseDirectory, scanCandidates, type ReleaseCandidate } from "./candidate-scanner.js";
import { planLinks, rankCandidates, type LinkPlan } from "./link-planner.js";
import {
  failedOutcomes,
  readBinding,
  reconcileLinks,
  type FailedSlotOutcome,
  type SlotOutcome,
} from "./symlink-reconciler.js";
import { getTracer } from "./global-tracer.js";
import type { TraceLogger } from "./tracer.js";

// ============================================================================
// Types
// ============================================================================

export interface LinkManagerOptions {
  fs?: FileSystemClient;
  log?: TraceLogger;
}

export interface ManageLinksResult {
  root: string;
  family: ReleaseFamily;
  /** Candidates, newest first */
  ranked: ReleaseCandidate[];
  plan: LinkPlan;
  outcomes: SlotOutcome[];
  failures: FailedSlotOutcome[];
}

/** Link name → directory it resolves to, or null when absent/broken/not a link */
export type LinkListing = Record<string, string | null>;

export interface RemoveReleaseResult {
  removedPath: string;
  /** Link names that pointed at the removed release */
  unlinked: string[];
  links: ManageLinksResult;
}

// ============================================================================
// Manager
// ============================================================================

export class LinkManager {
  private readonly fs: FileSystemClient;
  private readonly log: TraceLogger;

  constructor(opts: LinkManagerOptions = {}) {
    this.fs = opts.fs ?? nodeFileSystem;
    this.log = opts.log ?? getTracer().createTrace("links");
  }

  /**
   * Point the family's three link slots at its three newest installed
   * releases. `manualTag` names a release the caller just installed; it must
   * exist on disk. Zero installed releases is not an error: every slot is
   * cleared.
   */
  async manageLinks(root: string, family: ReleaseFamily, manualTag?: string): Promise<ManageLinksResult> {
    const started = Date.now();
    const candidates = await scanCandidates(root, family, { fs: this.fs, log: this.log, manualTag });
    if (candidates.length === 0) {
      this.log.warn({ scope: "links", op: "scan", family, path: root, msg: `No installed ${family} releases found in ${root}` });
    }
    const result = await this.converge(root, family, candidates);
    this.log.info({
      scope: "links",
      op: "manage",
      family,
      path: root,
      tag: manualTag,
      dur: Date.now() - started,
      msg: `Managed ${family} links (${result.failures.length} failure(s))`,
    });
    return result;
  }

  /**
   * Rebuild the links from what is installed. Unlike manageLinks this
   * requires a writable root and at least one release.
   */
  async relink(root: string, family: ReleaseFamily): Promise<ManageLinksResult> {
    await ensureWritableDirectory(root, this.fs);
    const candidates = await scanCandidates(root, family, { fs: this.fs, log: this.log });
    if (candidates.length === 0) {
      throw new NoCandidatesError(family, root);
    }
    this.log.info({ scope: "links", op: "relink", family, path: root, msg: `Relinking ${family} links` });
    return this.converge(root, family, candidates);
  }

  async listLinks(root: string, family: ReleaseFamily): Promise<LinkListing> {
    const listing: LinkListing = {};
    for (const slot of LINK_SLOTS) {
      const linkName = linkNameFor(family, slot);
      const binding = await readBinding(path.join(root, linkName), this.fs);
      listing[linkName] = binding.state === "bound" ? binding.resolved : null;
    }
    return listing;
  }

  /**
   * Delete one installed release and re-link the family so the slots only
   * point at releases that still exist.
   */
  async removeRelease(root: string, tag: string, family: ReleaseFamily): Promise<RemoveReleaseResult> {
    const releasePath = await resolveReleaseDirectory(root, tag, family, this.fs);
    const releaseRealPath = (await this.fs.resolve(releasePath)) ?? path.resolve(releasePath);

    const pointing: string[] = [];
    for (const slot of LINK_SLOTS) {
      const linkPath = path.join(root, linkNameFor(family, slot));
      const binding = await readBinding(linkPath, this.fs);
      if ((binding.state === "bound" && binding.resolved === releaseRealPath) || binding.state === "broken") {
        pointing.push(linkPath);
      }
    }

    try {
      await this.fs.removeTree(releasePath);
    } catch (error) {
      this.log.error({ scope: "release", op: "remove", family, tag, path: releasePath, msg: `Failed to remove ${releasePath}`, error: errorMessage(error) });
      throw new ReleaseRemovalError(releasePath, error);
    }
    this.log.info({ scope: "release", op: "remove", family, tag, path: releasePath, msg: `Removed release directory ${releasePath}` });

    const unlinked: string[] = [];
    for (const linkPath of pointing) {
      try {
        await this.fs.unlink(linkPath);
        unlinked.push(path.basename(linkPath));
        this.log.info({ scope: "release", op: "unlink", family, tag, path: linkPath, msg: `Removed symbolic link ${linkPath}` });
      } catch (error) {
        this.log.error({ scope: "release", op: "unlink", family, tag, path: linkPath, msg: `Failed to remove symbolic link ${linkPath}`, error: errorMessage(error) });
      }
    }

    const links = await this.manageLinks(root, family);
    return { removedPath: releasePath, unlinked, links };
  }

  private async converge(root: string, family: ReleaseFamily, candidates: ReleaseCandidate[]): Promise<ManageLinksResult> {
    const ranked = rankCandidates(candidates);
    const plan = planLinks(ranked);
    this.log.debug({
      scope: "plan",
      op: "rank",
      family,
      path: root,
      msg: `Ranked ${ranked.length} candidate(s)`,
      data: { ranked: ranked.map((c) => `${c.name} ${formatVersionKey(c.key)}`), plan },
    });
    const outcomes = await reconcileLinks(root, family, plan, { fs: this.fs, log: this.log });
    return { root, family, ranked, plan, outcomes, failures: failedOutcomes(outcomes) };
  }
}
