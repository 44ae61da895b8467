/**
 * Symlink Reconciler: converges a family's three link slots onto a plan.
 *
 * Runs an unassign pass (slots the plan leaves empty) before an assign pass,
 * so every desired name is free before a link is created at it. Each slot is
 * handled independently: a failure is recorded in its outcome and the
 * remaining slots still run. A directory the plan binds is never deleted.
 */

import * as path from "node:path";
import {
  LINK_SLOTS,
  errorMessage,
  isWithin,
  linkNameFor,
  type LinkSlot,
  type ReleaseFamily,
} from "@protonlink/core";
import { errorCode, isPermissionDenied, type FileSystemClient } from "./fs-client.js";
import { plannedTargets, type LinkPlan } from "./link-planner.js";
import type { TraceLogger } from "./tracer.js";

// ============================================================================
// Types
// ============================================================================

export type SymlinkBinding =
  | { state: "absent" }
  | { state: "broken"; linkTarget: string }
  | { state: "collision"; kind: "directory" | "file" }
  | { state: "bound"; linkTarget: string; resolved: string };

export type SlotAction = "unchanged" | "created" | "replaced" | "empty";

interface SlotOutcomeBase {
  slot: LinkSlot;
  linkName: string;
  linkPath: string;
}

export type SlotOutcome = SlotOutcomeBase &
  (
    | { status: "ok"; action: SlotAction; target: string | null }
    | { status: "removed"; previous: "symlink" | "directory" | "file" }
    | { status: "failed"; target: string | null; reason: string; code?: string }
  );

export type FailedSlotOutcome = Extract<SlotOutcome, { status: "failed" }>;

export interface ReconcileOptions {
  fs: FileSystemClient;
  log: TraceLogger;
}

interface ReconcileContext extends ReconcileOptions {
  root: string;
  family: ReleaseFamily;
  /** Real paths of every directory the plan binds */
  protectedPaths: Set<string>;
}

// ============================================================================
// Binding lookup
// ============================================================================

/**
 * Observe what currently occupies a link slot. A dangling symlink is
 * reported as "broken", not thrown.
 */
export async function readBinding(linkPath: string, fsClient: FileSystemClient): Promise<SymlinkBinding> {
  const kind = await fsClient.entryKind(linkPath);
  switch (kind) {
    case "absent":
      return { state: "absent" };
    case "directory":
    case "file":
      return { state: "collision", kind };
    case "symlink": {
      const linkTarget = await fsClient.readLink(linkPath);
      const resolved = await fsClient.resolve(linkPath);
      return resolved === null ? { state: "broken", linkTarget } : { state: "bound", linkTarget, resolved };
    }
  }
}

/**
 * Value stored in a new link: relative to the root when the target lives
 * inside it, absolute otherwise.
 */
export function linkValueFor(root: string, target: string): string {
  const absoluteRoot = path.resolve(root);
  const absoluteTarget = path.resolve(target);
  if (isWithin(absoluteRoot, absoluteTarget) && absoluteTarget !== absoluteRoot) {
    return path.relative(absoluteRoot, absoluteTarget);
  }
  return absoluteTarget;
}

export function failedOutcomes(outcomes: readonly SlotOutcome[]): FailedSlotOutcome[] {
  return outcomes.filter((o): o is FailedSlotOutcome => o.status === "failed");
}

/** Whether applying the plan changed anything on disk */
export function hasChanges(outcomes: readonly SlotOutcome[]): boolean {
  return outcomes.some(
    (o) => o.status === "removed" || (o.status === "ok" && (o.action === "created" || o.action === "replaced"))
  );
}

// ============================================================================
// Slot handlers
// ============================================================================

async function realPathOf(p: string, fsClient: FileSystemClient): Promise<string> {
  return (await fsClient.resolve(p)) ?? path.resolve(p);
}

function slotBase(ctx: ReconcileContext, slot: LinkSlot): SlotOutcomeBase {
  const linkName = linkNameFor(ctx.family, slot);
  return { slot, linkName, linkPath: path.join(ctx.root, linkName) };
}

function failure(
  ctx: ReconcileContext,
  base: SlotOutcomeBase,
  target: string | null,
  op: string,
  error: unknown
): SlotOutcome {
  const reason = isPermissionDenied(error)
    ? `${errorMessage(error)} (no write permission in ${ctx.root})`
    : errorMessage(error);
  const code = errorCode(error);
  ctx.log.error({
    scope: "reconcile",
    op,
    family: ctx.family,
    slot: base.slot,
    path: base.linkPath,
    target: target ?? undefined,
    msg: `Failed to ${op} ${base.linkName}`,
    error: reason,
  });
  return { ...base, status: "failed", target, reason, code };
}

function protectedDirectoryFailure(ctx: ReconcileContext, base: SlotOutcomeBase, target: string | null): SlotOutcome {
  const reason = `${base.linkName} is a real directory that is itself a ranked release; left in place`;
  ctx.log.error({ scope: "reconcile", op: "protect", family: ctx.family, slot: base.slot, path: base.linkPath, msg: reason });
  return { ...base, status: "failed", target, reason };
}

async function isProtected(ctx: ReconcileContext, linkPath: string): Promise<boolean> {
  return ctx.protectedPaths.has(await realPathOf(linkPath, ctx.fs));
}

async function unassignSlot(ctx: ReconcileContext, slot: LinkSlot): Promise<SlotOutcome> {
  const base = slotBase(ctx, slot);
  try {
    const binding = await readBinding(base.linkPath, ctx.fs);
    switch (binding.state) {
      case "absent":
        return { ...base, status: "ok", action: "empty", target: null };
      case "broken":
      case "bound":
        await ctx.fs.unlink(base.linkPath);
        ctx.log.info({ scope: "reconcile", op: "unlink", family: ctx.family, slot, path: base.linkPath, msg: `Removed unused link ${base.linkName}` });
        return { ...base, status: "removed", previous: "symlink" };
      case "collision":
        if (binding.kind === "file") {
          await ctx.fs.unlink(base.linkPath);
          ctx.log.info({ scope: "reconcile", op: "unlink", family: ctx.family, slot, path: base.linkPath, msg: `Removed file occupying ${base.linkName}` });
          return { ...base, status: "removed", previous: "file" };
        }
        if (await isProtected(ctx, base.linkPath)) {
          return protectedDirectoryFailure(ctx, base, null);
        }
        await ctx.fs.removeTree(base.linkPath);
        ctx.log.info({ scope: "reconcile", op: "rmtree", family: ctx.family, slot, path: base.linkPath, msg: `Removed directory occupying ${base.linkName}` });
        return { ...base, status: "removed", previous: "directory" };
    }
  } catch (error) {
    return failure(ctx, base, null, "remove", error);
  }
}

async function assignSlot(ctx: ReconcileContext, slot: LinkSlot, target: string): Promise<SlotOutcome> {
  const base = slotBase(ctx, slot);
  const logFields = { scope: "reconcile", family: ctx.family, slot, path: base.linkPath, target };

  let replaced = false;
  try {
    const binding = await readBinding(base.linkPath, ctx.fs);
    switch (binding.state) {
      case "absent":
        break;
      case "bound":
        if (binding.resolved === (await realPathOf(target, ctx.fs))) {
          ctx.log.debug({ ...logFields, op: "check", msg: `${base.linkName} already points to ${binding.linkTarget}` });
          return { ...base, status: "ok", action: "unchanged", target };
        }
        await ctx.fs.unlink(base.linkPath);
        ctx.log.info({ ...logFields, op: "unlink", msg: `Removed stale link ${base.linkName} -> ${binding.linkTarget}` });
        replaced = true;
        break;
      case "broken":
        await ctx.fs.unlink(base.linkPath);
        ctx.log.info({ ...logFields, op: "unlink", msg: `Removed broken link ${base.linkName} -> ${binding.linkTarget}` });
        replaced = true;
        break;
      case "collision":
        if (binding.kind === "file") {
          await ctx.fs.unlink(base.linkPath);
        } else if (await isProtected(ctx, base.linkPath)) {
          return protectedDirectoryFailure(ctx, base, target);
        } else {
          await ctx.fs.removeTree(base.linkPath);
        }
        ctx.log.info({ ...logFields, op: binding.kind === "file" ? "unlink" : "rmtree", msg: `Removed ${binding.kind} occupying ${base.linkName}` });
        replaced = true;
        break;
    }
  } catch (error) {
    return failure(ctx, base, target, "clear", error);
  }

  const linkValue = linkValueFor(ctx.root, target);
  try {
    await ctx.fs.symlink(linkValue, base.linkPath);
  } catch (error) {
    return failure(ctx, base, target, "symlink", error);
  }
  ctx.log.info({ ...logFields, op: "symlink", msg: `Created symlink ${base.linkName} -> ${linkValue}` });
  return { ...base, status: "ok", action: replaced ? "replaced" : "created", target };
}

// ============================================================================
// Reconcile
// ============================================================================

/**
 * Apply a plan to the family's link slots under `root`. Returns one outcome
 * per slot, in slot order; never throws for a single slot's failure.
 */
export async function reconcileLinks(
  root: string,
  family: ReleaseFamily,
  plan: LinkPlan,
  opts: ReconcileOptions
): Promise<SlotOutcome[]> {
  const protectedPaths = new Set<string>();
  for (const target of plannedTargets(plan)) {
    protectedPaths.add(await realPathOf(target, opts.fs));
  }
  const ctx: ReconcileContext = { ...opts, root, family, protectedPaths };

  const outcomes = new Map<LinkSlot, SlotOutcome>();
  for (const slot of LINK_SLOTS) {
    if (plan[slot] === undefined) {
      outcomes.set(slot, await unassignSlot(ctx, slot));
    }
  }
  for (const slot of LINK_SLOTS) {
    const target = plan[slot];
    if (target !== undefined) {
      outcomes.set(slot, await assignSlot(ctx, slot, target));
    }
  }

  return LINK_SLOTS.flatMap((slot) => {
    const outcome = outcomes.get(slot);
    return outcome ? [outcome] : [];
  });
}
