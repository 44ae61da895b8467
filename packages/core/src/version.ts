/**
 * Version keys for release tags.
 *
 * Every family maps a tag onto the same four-element key so that ranking
 * code never needs to know which family it is looking at.
 */

import type { ReleaseFamily } from "./families/_types.js";
import { FAMILY_REGISTRY } from "./families/_registry.js";

export type VersionKey = readonly [prefix: string, major: number, minor: number, patch: number];

/**
 * Parse a tag (or a prefix-stripped directory name) into its VersionKey.
 *
 * Never fails: a name the family grammar does not match yields the degenerate
 * key `[name, 0, 0, 0]`.
 */
export function parseVersion(name: string, family: ReleaseFamily): VersionKey {
  const { grammar } = FAMILY_REGISTRY[family];
  const match = grammar.pattern.exec(name);
  if (!match) {
    return [name, 0, 0, 0];
  }

  const numbers: [number, number, number] = [0, 0, 0];
  grammar.fields.forEach((position, i) => {
    numbers[position - 1] = Number.parseInt(match[i + 1], 10);
  });
  return [grammar.prefix, ...numbers];
}

export function isWellFormedTag(name: string, family: ReleaseFamily): boolean {
  return FAMILY_REGISTRY[family].grammar.pattern.test(name);
}

function sign(n: number): -1 | 0 | 1 {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/**
 * Lexicographic tuple order: string comparison on the prefix, integer
 * comparison on the numeric fields.
 */
export function compareVersionKeys(a: VersionKey, b: VersionKey): -1 | 0 | 1 {
  if (a[0] !== b[0]) {
    return a[0] < b[0] ? -1 : 1;
  }
  for (const i of [1, 2, 3] as const) {
    const diff = sign(a[i] - b[i]);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function compareVersions(tagA: string, tagB: string, family: ReleaseFamily): -1 | 0 | 1 {
  return compareVersionKeys(parseVersion(tagA, family), parseVersion(tagB, family));
}

export function versionKeysEqual(a: VersionKey, b: VersionKey): boolean {
  return compareVersionKeys(a, b) === 0;
}

export function formatVersionKey(key: VersionKey): string {
  return `(${JSON.stringify(key[0])}, ${key[1]}, ${key[2]}, ${key[3]})`;
}
