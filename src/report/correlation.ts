/**
 * Cross-detector correlation
 *
 * Post-pass over the classified findings: findings of different categories
 * in the same function point at each other.
 */

import type { Finding } from "../types/index.js";

function functionKey(finding: Finding): string | undefined {
  const { file, function: fn } = finding.location;
  return fn === undefined ? undefined : `${file}#${fn}`;
}

export function correlateFindings(findings: readonly Finding[]): Finding[] {
  const byFunction = new Map<string, Finding[]>();
  for (const finding of findings) {
    const key = functionKey(finding);
    if (key === undefined) continue;
    const group = byFunction.get(key) ?? [];
    group.push(finding);
    byFunction.set(key, group);
  }

  return findings.map((finding) => {
    const key = functionKey(finding);
    const group = key === undefined ? [] : byFunction.get(key) ?? [];
    const related = group
      .filter((other) => other.category !== finding.category)
      .map((other) => other.id)
      .sort();
    const { correlatedWith: _previous, ...rest } = finding;
    return related.length > 0 ? { ...rest, correlatedWith: [...new Set(related)] } : rest;
  });
}
