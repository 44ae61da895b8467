/**
 * Terminal formatting for link results.
 */

import { contractPath } from "@protonlink/core";
import type { ReleaseCandidate } from "../core/candidate-scanner.js";
import type { ManageLinksResult } from "../core/link-manager.js";
import type { SlotOutcome } from "../core/symlink-reconciler.js";

export function formatOutcome(outcome: SlotOutcome): string {
  switch (outcome.status) {
    case "ok":
      if (outcome.target === null) {
        return `· ${outcome.linkName} (unused)`;
      }
      return `✓ ${outcome.linkName} -> ${contractPath(outcome.target)} (${outcome.action})`;
    case "removed":
      return `✓ ${outcome.linkName} removed (was a ${outcome.previous})`;
    case "failed":
      return `✗ ${outcome.linkName}: ${outcome.reason}`;
  }
}

export function formatRanking(ranked: readonly ReleaseCandidate[]): string[] {
  return ranked.map((candidate, i) => `  ${i + 1}. ${candidate.name}`);
}

export function formatLinkResult(result: ManageLinksResult): string[] {
  const lines: string[] = [];
  if (result.ranked.length === 0) {
    lines.push(`No installed ${result.family} releases in ${contractPath(result.root)}`);
  } else {
    lines.push(`${result.family} releases in ${contractPath(result.root)} (newest first):`);
    lines.push(...formatRanking(result.ranked));
  }
  lines.push(...result.outcomes.map(formatOutcome));
  return lines;
}
