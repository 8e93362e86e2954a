/**
 * Operator precedence
 *
 * Operators are ordered topologically over "must come before" constraints
 * between their entity ids. Among the operators ready at each step the one
 * registered first is taken, so unconstrained operators keep registration
 * order.
 */

import { fail } from "@generis/core";

export type PrecedenceEntry<T> = {
  readonly item: T;
  readonly entityId: string;
  /** Entity ids that must be consulted before this entry */
  readonly dependsOn: readonly string[];
};

/** [dependent, dependency]: the dependency's operators come first */
export type PrecedencePair = readonly [dependent: string, dependency: string];

export const orderByPrecedence = <T>(
  entries: readonly PrecedenceEntry<T>[],
  pairs: readonly PrecedencePair[] = []
): readonly T[] => {
  const dependencies = new Map<string, Set<string>>();
  const addDependency = (dependent: string, dependency: string): void => {
    if (dependent === dependency) return;
    const set = dependencies.get(dependent) ?? new Set<string>();
    set.add(dependency);
    dependencies.set(dependent, set);
  };
  for (const entry of entries) {
    for (const dependency of entry.dependsOn) {
      addDependency(entry.entityId, dependency);
    }
  }
  for (const [dependent, dependency] of pairs) {
    addDependency(dependent, dependency);
  }

  // Edges between entries; ids no entry carries are ignored
  const incoming = entries.map(() => 0);
  const outgoing = entries.map((): number[] => []);
  entries.forEach((entry, j) => {
    const required = dependencies.get(entry.entityId);
    if (!required) return;
    entries.forEach((other, i) => {
      if (i !== j && required.has(other.entityId)) {
        outgoing[i]?.push(j);
        incoming[j] = (incoming[j] ?? 0) + 1;
      }
    });
  });

  const placed = entries.map(() => false);
  const ordered: T[] = [];
  while (ordered.length < entries.length) {
    const next = entries.findIndex((_, i) => !placed[i] && incoming[i] === 0);
    if (next < 0) {
      const remaining = entries
        .filter((_, i) => !placed[i])
        .map((entry) => entry.entityId);
      return fail(
        "GEN1002",
        `Cyclic operator precedence among: ${[...new Set(remaining)].join(", ")}`
      );
    }
    placed[next] = true;
    const entry = entries[next];
    if (entry) ordered.push(entry.item);
    for (const dependent of outgoing[next] ?? []) {
      incoming[dependent] = (incoming[dependent] ?? 0) - 1;
    }
  }
  return ordered;
};
