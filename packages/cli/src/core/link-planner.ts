/**
 * Link Planner: ranks release candidates and assigns the top three to the
 * family's link slots.
 */

import { LINK_SLOTS, compareVersionKeys, type LinkSlot } from "@protonlink/core";
import type { ReleaseCandidate } from "./candidate-scanner.js";

/** Desired slot → release directory. Slots without an entry must end up empty. */
export type LinkPlan = Partial<Record<LinkSlot, string>>;

/** Newest first */
export function rankCandidates(candidates: readonly ReleaseCandidate[]): ReleaseCandidate[] {
  return [...candidates].sort((a, b) => compareVersionKeys(b.key, a.key));
}

export function planLinks(candidates: readonly ReleaseCandidate[]): LinkPlan {
  const ranked = rankCandidates(candidates);
  const plan: LinkPlan = {};
  LINK_SLOTS.forEach((slot, i) => {
    if (i < ranked.length) {
      plan[slot] = ranked[i].path;
    }
  });
  return plan;
}

/** Distinct directories a plan binds, in slot order */
export function plannedTargets(plan: LinkPlan): string[] {
  const targets: string[] = [];
  for (const slot of LINK_SLOTS) {
    const target = plan[slot];
    if (target !== undefined && !targets.includes(target)) targets.push(target);
  }
  return targets;
}
