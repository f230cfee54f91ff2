/**
 * Table: homogeneous row store with generational slot reuse.
 *
 * Rows live in the leaves of a persistent 32-way trie. A write copies the
 * path from the root to one leaf, so its cost grows with the depth of the
 * trie (log32 of the row count) and a snapshot taken before the write keeps
 * sharing every untouched node with the current data.
 *
 * Removing a row negates its generation and pushes the index onto the free
 * list. Adding a row pops the free list first and revives the slot with
 * generation `-old + 1`, which invalidates every Handle to the previous
 * occupant. A slot whose generation has reached `maxGeneration` is retired
 * on removal instead of being reused.
 */

import { type Handle, createHandle } from './handle';

// ── Types ───────────────────────────────────────────────────────────

export const BRANCH_BITS = 5;
export const BRANCH_FACTOR = 1 << BRANCH_BITS;
const BRANCH_MASK = BRANCH_FACTOR - 1;

export interface Slot<C> {
  /** > 0 while the row is live, < 0 once it has been removed */
  readonly generation: number;
  readonly columns: C;
}

export type TrieNode<C> =
  | { readonly kind: 'leaf'; readonly slots: ReadonlyArray<Slot<C>> }
  | { readonly kind: 'branch'; readonly children: ReadonlyArray<TrieNode<C>> };

export interface TableData<C> {
  readonly size: number;
  /** Bit shift of the root level, 0 when the root is a leaf */
  readonly shift: number;
  readonly root: TrieNode<C>;
}

export type HandleErrorReason = 'TABLE_MISMATCH' | 'INVALID_INDEX' | 'GENERATION_MISMATCH';

export class HandleError extends Error {
  readonly reason: HandleErrorReason;
  readonly handle: Handle;

  constructor(reason: HandleErrorReason, handle: Handle, message: string) {
    super(message);
    this.name = 'HandleError';
    this.reason = reason;
    this.handle = handle;
  }
}

/** Where a Table reads and writes its current data. Supplied by the Storage. */
export interface TableBackend<C> {
  read(): TableData<C>;
  write(data: TableData<C>): void;
}

export interface TableOptions {
  /** Largest generation a slot may carry before it is retired */
  maxGeneration: number;
}

export interface Table<C> {
  readonly id: string;

  /** Add a row, reusing a free slot if one exists. */
  addRow(columns: C): Handle;
  /** Remove a live row. Throws HandleError if the Handle is invalid. */
  removeRow(handle: Handle): void;

  get(handle: Handle): Readonly<C>;
  set<K extends keyof C>(handle: Handle, column: K, value: C[K]): void;
  update(handle: Handle, patch: Partial<C>): void;

  isHandleValid(handle: Handle): boolean;
  /** Why a Handle is invalid, or null if it is valid. Never throws. */
  checkHandle(handle: Handle): HandleErrorReason | null;

  /** Raw generation stored at an index (negative for removed rows). */
  generationAt(index: number): number;
  /** Handles to all live rows, in index order. */
  handles(): Handle[];

  /** Total number of slots (live, free and retired). */
  size(): number;
  liveCount(): number;
  freeCount(): number;
  retiredCount(): number;
  /** Copy of the free list, most recently freed index last. */
  freeList(): number[];

  /** Rebuild free-list bookkeeping after the Storage data was replaced. */
  refreshFreeList(): void;

  toString(): string;
}

// ── Trie helpers ────────────────────────────────────────────────────

function leaf<C>(slots: Slot<C>[]): TrieNode<C> {
  const node: TrieNode<C> = { kind: 'leaf', slots: Object.freeze(slots) };
  return Object.freeze(node);
}

function branch<C>(children: TrieNode<C>[]): TrieNode<C> {
  const node: TrieNode<C> = { kind: 'branch', children: Object.freeze(children) };
  return Object.freeze(node);
}

export function emptyTableData<C>(): TableData<C> {
  return Object.freeze({ size: 0, shift: 0, root: leaf<C>([]) });
}

/** Slot stored at an index. The index must be below `data.size`. */
export function slotAt<C>(data: TableData<C>, index: number): Slot<C> {
  let node = data.root;
  for (let level = data.shift; node.kind === 'branch'; level -= BRANCH_BITS) {
    node = node.children[(index >>> level) & BRANCH_MASK];
  }
  return node.slots[index & BRANCH_MASK];
}

function replaceIn<C>(node: TrieNode<C>, level: number, index: number, slot: Slot<C>): TrieNode<C> {
  if (node.kind === 'leaf') {
    const slots = node.slots.slice();
    slots[index & BRANCH_MASK] = slot;
    return leaf(slots);
  }
  const position = (index >>> level) & BRANCH_MASK;
  const children = node.children.slice();
  children[position] = replaceIn(children[position], level - BRANCH_BITS, index, slot);
  return branch(children);
}

function replaceSlot<C>(data: TableData<C>, index: number, slot: Slot<C>): TableData<C> {
  return Object.freeze({ size: data.size, shift: data.shift, root: replaceIn(data.root, data.shift, index, slot) });
}

/** A chain of single-child branches down to a leaf holding one slot. */
function pathTo<C>(level: number, slot: Slot<C>): TrieNode<C> {
  return level === 0 ? leaf([slot]) : branch([pathTo(level - BRANCH_BITS, slot)]);
}

function appendIn<C>(node: TrieNode<C>, level: number, index: number, slot: Slot<C>): TrieNode<C> {
  if (node.kind === 'leaf') {
    return leaf([...node.slots, slot]);
  }
  const position = (index >>> level) & BRANCH_MASK;
  const children = node.children.slice();
  children[position] = position < node.children.length
    ? appendIn(node.children[position], level - BRANCH_BITS, index, slot)
    : pathTo(level - BRANCH_BITS, slot);
  return branch(children);
}

function appendSlot<C>(data: TableData<C>, slot: Slot<C>): TableData<C> {
  const { size, shift, root } = data;

  if (size === 2 ** (shift + BRANCH_BITS)) {
    const grown = branch([root, pathTo(shift, slot)]);
    return Object.freeze({ size: size + 1, shift: shift + BRANCH_BITS, root: grown });
  }
  return Object.freeze({ size: size + 1, shift, root: appendIn(root, shift, size, slot) });
}

/** Visit every slot in index order. */
function forEachSlot<C>(data: TableData<C>, visit: (slot: Slot<C>, index: number) => void): void {
  let index = 0;
  const walk = (node: TrieNode<C>): void => {
    if (node.kind === 'leaf') {
      for (const slot of node.slots) visit(slot, index++);
      return;
    }
    for (const child of node.children) walk(child);
  };
  walk(data.root);
}

function createSlot<C>(generation: number, columns: C): Slot<C> {
  Object.freeze(columns);
  return Object.freeze({ generation, columns });
}

// ── Factory ─────────────────────────────────────────────────────────

export function createTable<C>(
  id: string,
  backend: TableBackend<C>,
  options: TableOptions,
): Table<C> {
  const { maxGeneration } = options;

  if (!Number.isInteger(maxGeneration) || maxGeneration < 1) {
    throw new Error(`maxGeneration must be a positive integer, got ${maxGeneration}`);
  }

  let freeIndices: number[] = [];
  let retired = 0;

  function check(handle: Handle, data: TableData<C>): HandleErrorReason | null {
    if (handle.table !== id) return 'TABLE_MISMATCH';
    if (!Number.isInteger(handle.index) || handle.index < 0 || handle.index >= data.size) {
      return 'INVALID_INDEX';
    }
    if (handle.generation <= 0 || slotAt(data, handle.index).generation !== handle.generation) {
      return 'GENERATION_MISMATCH';
    }
    return null;
  }

  /** Throws HandleError unless the Handle addresses a live row. */
  function requireSlot(handle: Handle, data: TableData<C>): Slot<C> {
    const reason = check(handle, data);
    if (reason === 'TABLE_MISMATCH') {
      throw new HandleError(reason, handle,
        `Cannot use a Handle for table "${handle.table}" to access table "${id}"`);
    }
    if (reason === 'INVALID_INDEX') {
      throw new HandleError(reason, handle,
        `Invalid Handle index ${handle.index} for table "${id}" with ${data.size} rows`);
    }
    if (reason === 'GENERATION_MISMATCH') {
      throw new HandleError(reason, handle,
        `Invalid Handle generation ${handle.generation} for row ${handle.index} of table "${id}" ` +
        `with current generation ${slotAt(data, handle.index).generation}`);
    }
    return slotAt(data, handle.index);
  }

  function writeColumns(handle: Handle, columns: C): void {
    const data = backend.read();
    const slot = requireSlot(handle, data);
    backend.write(replaceSlot(data, handle.index, createSlot(slot.generation, columns)));
  }

  return {
    id,

    addRow(columns: C): Handle {
      const data = backend.read();
      const reused = freeIndices.pop();

      if (reused === undefined) {
        const index = data.size;
        backend.write(appendSlot(data, createSlot(1, columns)));
        return createHandle(id, index, 1);
      }

      const generation = -slotAt(data, reused).generation + 1;
      if (generation <= 1 || generation > maxGeneration) {
        throw new Error(`Free slot ${reused} of table "${id}" has an unusable generation ${generation - 1}`);
      }
      backend.write(replaceSlot(data, reused, createSlot(generation, columns)));
      return createHandle(id, reused, generation);
    },

    removeRow(handle: Handle): void {
      const data = backend.read();
      const slot = requireSlot(handle, data);

      backend.write(replaceSlot(data, handle.index, createSlot(-slot.generation, slot.columns)));

      if (slot.generation >= maxGeneration) {
        retired++;
      } else {
        freeIndices.push(handle.index);
      }
    },

    get(handle: Handle): Readonly<C> {
      return requireSlot(handle, backend.read()).columns;
    },

    set<K extends keyof C>(handle: Handle, column: K, value: C[K]): void {
      const current = requireSlot(handle, backend.read()).columns;
      writeColumns(handle, { ...current, [column]: value });
    },

    update(handle: Handle, patch: Partial<C>): void {
      const current = requireSlot(handle, backend.read()).columns;
      writeColumns(handle, { ...current, ...patch });
    },

    isHandleValid(handle: Handle): boolean {
      return check(handle, backend.read()) === null;
    },

    checkHandle(handle: Handle): HandleErrorReason | null {
      return check(handle, backend.read());
    },

    generationAt(index: number): number {
      const data = backend.read();
      if (index < 0 || index >= data.size) {
        throw new RangeError(`Index ${index} is out of range for table "${id}" with ${data.size} rows`);
      }
      return slotAt(data, index).generation;
    },

    handles(): Handle[] {
      const data = backend.read();
      const live: Handle[] = [];
      forEachSlot(data, ({ generation }, index) => {
        if (generation > 0) live.push(createHandle(id, index, generation));
      });
      return live;
    },

    size(): number {
      return backend.read().size;
    },

    liveCount(): number {
      return backend.read().size - freeIndices.length - retired;
    },

    freeCount(): number {
      return freeIndices.length;
    },

    retiredCount(): number {
      return retired;
    },

    freeList(): number[] {
      return [...freeIndices];
    },

    refreshFreeList(): void {
      const data = backend.read();
      freeIndices = [];
      retired = 0;
      forEachSlot(data, ({ generation }, index) => {
        if (generation > 0) return;
        if (-generation >= maxGeneration) {
          retired++;
        } else {
          freeIndices.push(index);
        }
      });
    },

    toString(): string {
      return `Table "${id}" (${backend.read().size} rows, ${freeIndices.length} free, ${retired} retired)`;
    },
  };
}
