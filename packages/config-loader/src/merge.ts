import {
  createMapping,
  duplicateKeys,
  isMapping,
  mappingEntries,
  type RawMapping,
  type RawNode,
} from "./nodes.js";

/**
 * Deep merge two resolved nodes. The override wins.
 *
 * Only mapping x mapping pairs recurse; sequences, scalars, `null` and
 * mismatched shapes are replaced wholesale by the override. Keys keep the
 * base's order, with keys new to the override appended in its order.
 */
export function mergeNodes(base: RawNode, override: RawNode): RawNode {
  if (!isMapping(base) || !isMapping(override)) {
    return override;
  }

  return mergeMappings(base, override);
}

export function mergeMappings(base: RawMapping, override: RawMapping): RawMapping {
  const values = new Map<string, RawNode>(mappingEntries(base));

  for (const [key, value] of mappingEntries(override)) {
    const previous = values.get(key);
    values.set(key, previous === undefined ? value : mergeNodes(previous, value));
  }

  return createMapping(values, [...duplicateKeys(base), ...duplicateKeys(override)]);
}

/**
 * Merge an ordered list of fragments, later fragments overriding earlier ones.
 * An empty list merges to an empty mapping.
 */
export function mergeFragments(fragments: readonly RawNode[]): RawNode {
  let merged: RawNode = {};
  let first = true;

  for (const fragment of fragments) {
    merged = first ? fragment : mergeNodes(merged, fragment);
    first = false;
  }

  return merged;
}
