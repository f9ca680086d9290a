/**
 * Pairing of two symbol lists taken from revisions of the same file.
 */

import type { CodeSymbol } from "@api-drift/symbols";
import { symbolKey } from "@api-drift/symbols";

export interface SymbolPair {
  old: CodeSymbol;
  new: CodeSymbol;
}

export interface SymbolDiff {
  removed: CodeSymbol[];
  added: CodeSymbol[];
  common: SymbolPair[];
}

export interface DiffOptions {
  /**
   * Whether the language allows several callables under one key.
   * When false, a repeated key keeps only its last declaration.
   */
  overloading: boolean;
}

function groupByKey(symbols: readonly CodeSymbol[], overloading: boolean): Map<string, CodeSymbol[]> {
  const groups = new Map<string, CodeSymbol[]>();
  for (const symbol of symbols) {
    const key = symbolKey(symbol);
    const group = groups.get(key);
    if (group && overloading) {
      group.push(symbol);
    } else {
      groups.set(key, [symbol]);
    }
  }
  return groups;
}

/**
 * Pair members of one key's group. Single members pair directly; larger
 * groups pair by parameter count in declaration order.
 */
function pairGroup(
  oldGroup: readonly CodeSymbol[],
  newGroup: readonly CodeSymbol[],
  diff: SymbolDiff
): CodeSymbol[] {
  if (oldGroup.length === 1 && newGroup.length === 1) {
    diff.common.push({ old: oldGroup[0], new: newGroup[0] });
    return [];
  }

  const unpaired = [...newGroup];
  for (const oldSymbol of oldGroup) {
    const match = unpaired.findIndex((s) => s.parameters.length === oldSymbol.parameters.length);
    if (match < 0) {
      diff.removed.push(oldSymbol);
    } else {
      diff.common.push({ old: oldSymbol, new: unpaired[match] });
      unpaired.splice(match, 1);
    }
  }
  return unpaired;
}

/**
 * Split two revisions into removed, added and common declarations.
 * Removed and common keep old-side order; added keeps new-side order.
 */
export function diffSymbols(
  oldSymbols: readonly CodeSymbol[],
  newSymbols: readonly CodeSymbol[],
  options: DiffOptions
): SymbolDiff {
  const oldGroups = groupByKey(oldSymbols, options.overloading);
  const newGroups = groupByKey(newSymbols, options.overloading);
  const diff: SymbolDiff = { removed: [], added: [], common: [] };
  const leftovers = new Set<CodeSymbol>();

  for (const [key, oldGroup] of oldGroups) {
    const newGroup = newGroups.get(key);
    if (!newGroup) {
      diff.removed.push(...oldGroup);
      continue;
    }
    for (const symbol of pairGroup(oldGroup, newGroup, diff)) {
      leftovers.add(symbol);
    }
  }

  for (const [key, newGroup] of newGroups) {
    for (const symbol of newGroup) {
      if (!oldGroups.has(key) || leftovers.has(symbol)) {
        diff.added.push(symbol);
      }
    }
  }

  return diff;
}

export function parametersEqual(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((param, i) => param === b[i]);
}

/**
 * Whether a paired declaration differs in signature, parameters, return type or visibility.
 */
export function symbolChanged(oldSymbol: CodeSymbol, newSymbol: CodeSymbol): boolean {
  return (
    oldSymbol.signature !== newSymbol.signature ||
    !parametersEqual(oldSymbol.parameters, newSymbol.parameters) ||
    oldSymbol.returnType !== newSymbol.returnType ||
    oldSymbol.exported !== newSymbol.exported
  );
}
