/**
 * Storage: all Tables of the application under one immutable state value.
 *
 * `getData()` hands out the current root. Because every Table write
 * produces new frozen objects and never touches existing ones, that root
 * stays valid as a snapshot for as long as someone holds on to it.
 * `setData()` swaps a snapshot back in and rebuilds each Table's free list.
 */

import { type Table, type TableData, createTable } from './table';

// ── Types ───────────────────────────────────────────────────────────

/** Table name -> column type of its rows */
export type StorageLayout = { [table: string]: object };

export type StorageData<L extends StorageLayout> = {
  readonly [K in keyof L]: TableData<L[K]>;
};

export interface StorageOptions {
  /** Largest generation any slot may reach, see Table */
  maxGeneration: number;
}

export interface Storage<L extends StorageLayout> {
  /** Access a Table by name. The same Table object is returned on every call. */
  table<K extends keyof L & string>(name: K): Table<L[K]>;
  /** Current state of every Table. Immutable, safe to keep as a restoration point. */
  getData(): StorageData<L>;
  /** Replace the state of every Table with a value previously returned by getData(). */
  setData(data: StorageData<L>): void;
  /** Incremented on every write and every restore. */
  getVersion(): number;
}

export const DEFAULT_MAX_GENERATION = 2 ** 31 - 1;

// ── Factory ─────────────────────────────────────────────────────────

export function createStorage<L extends StorageLayout>(
  initial: StorageData<L>,
  options: StorageOptions = { maxGeneration: DEFAULT_MAX_GENERATION },
): Storage<L> {
  Object.freeze(initial);
  let root: StorageData<L> = initial;
  let version = 0;

  const tables: { [K in keyof L]?: Table<L[K]> } = {};
  const refreshers: Array<() => void> = [];

  return {
    table<K extends keyof L & string>(name: K): Table<L[K]> {
      const existing = tables[name];
      if (existing !== undefined) return existing;

      if (!(name in root)) {
        throw new Error(`Storage has no table named "${name}"`);
      }

      const created = createTable<L[K]>(
        name,
        {
          read: () => root[name],
          write: (data) => {
            const next = { ...root, [name]: data };
            Object.freeze(next);
            root = next;
            version++;
          },
        },
        { maxGeneration: options.maxGeneration },
      );
      created.refreshFreeList();

      tables[name] = created;
      refreshers.push(() => created.refreshFreeList());

      return created;
    },

    getData(): StorageData<L> {
      return root;
    },

    setData(data: StorageData<L>): void {
      root = data;
      version++;
      for (const refresh of refreshers) refresh();
    },

    getVersion(): number {
      return version;
    },
  };
}
