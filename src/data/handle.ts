/**
 * Handle: generational reference to a row in a Table.
 *
 * Handles are plain frozen values: cheap to copy, safe to keep around after
 * the row they name has been removed. Whether a Handle still addresses its
 * row is decided by the owning Table (see `Table.isHandleValid`).
 */

export interface Handle {
  /** Id of the Table the row lives in */
  readonly table: string;
  /** Row index inside the Table */
  readonly index: number;
  /** Generation of the row at the time the Handle was created (> 0) */
  readonly generation: number;
}

/** The null Handle. Generation 0 is never live, so it is invalid for every Table. */
export const NULL_HANDLE: Handle = Object.freeze({ table: '', index: 0, generation: 0 });

export function createHandle(table: string, index: number, generation: number): Handle {
  return Object.freeze({ table, index, generation });
}

export function isNullHandle(handle: Handle): boolean {
  return handle.generation === 0;
}

export function handlesEqual(a: Handle, b: Handle): boolean {
  return a.index === b.index && a.generation === b.generation && a.table === b.table;
}

export function containsHandle(list: readonly Handle[], handle: Handle): boolean {
  return list.some((entry) => handlesEqual(entry, handle));
}

export function withoutHandle(list: readonly Handle[], handle: Handle): readonly Handle[] {
  return Object.freeze(list.filter((entry) => !handlesEqual(entry, handle)));
}

export function withHandle(list: readonly Handle[], handle: Handle): readonly Handle[] {
  return Object.freeze([...list, handle]);
}

export function formatHandle(handle: Handle): string {
  return `${handle.table}#${handle.index}@${handle.generation}`;
}
