import { isReservedName } from "../value-objects/reserved-names";

/** Top-level entry names that an apply would add or overwrite. */
export type DiffResult = readonly string[];

export function toDiffResult(names: Iterable<string>): DiffResult {
  const unique = new Set<string>();
  for (const name of names) {
    if (!isReservedName(name)) unique.add(name);
  }
  return [...unique].sort();
}
