/**
 * Sort keys for ordered containers and their total order.
 */

export type SortKeyAtom = number | string | bigint | boolean | Date;
export type SortKey = SortKeyAtom | readonly SortKeyAtom[];

export type KeyFunction<T> = (item: T) => SortKey;

// Rank used when two atoms of different kinds meet.
function atomRank(atom: SortKeyAtom): number {
  if (typeof atom === "boolean") return 0;
  if (typeof atom === "number" || typeof atom === "bigint") return 1;
  if (atom instanceof Date) return 2;
  return 3;
}

function order<V extends number | bigint | string>(a: V, b: V): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareAtoms(a: SortKeyAtom, b: SortKeyAtom): number {
  const rankA = atomRank(a);
  const rankB = atomRank(b);
  if (rankA !== rankB) return rankA - rankB;
  if (a instanceof Date && b instanceof Date) return order(a.getTime(), b.getTime());
  if (typeof a === "string" && typeof b === "string") return order(a, b);
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  if (typeof a === "number" && typeof b === "number") return order(a, b);
  if (typeof a === "bigint" && typeof b === "bigint") return order(a, b);
  // Mixed number and bigint.
  if (typeof a === "number" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "bigint" && typeof b === "number") return a < b ? -1 : a > b ? 1 : 0;
  return 0;
}

function isTuple(key: SortKey): key is readonly SortKeyAtom[] {
  return Array.isArray(key);
}

/** Compares two keys; tuples compare element-wise, a prefix sorts first. */
export function compareKeys(a: SortKey, b: SortKey): number {
  const left: readonly SortKeyAtom[] = isTuple(a) ? a : [a];
  const right: readonly SortKeyAtom[] = isTuple(b) ? b : [b];
  const n = Math.min(left.length, right.length);
  for (let i = 0; i < n; i++) {
    const x = left[i];
    const y = right[i];
    if (x === undefined || y === undefined) break;
    const cmp = compareAtoms(x, y);
    if (cmp !== 0) return cmp;
  }
  return Math.sign(left.length - right.length);
}
