export {
  type Handle,
  NULL_HANDLE,
  createHandle,
  isNullHandle,
  handlesEqual,
  containsHandle,
  withHandle,
  withoutHandle,
  formatHandle,
} from './handle';

export {
  type Slot,
  type TrieNode,
  type TableData,
  type TableBackend,
  type TableOptions,
  type Table,
  type HandleErrorReason,
  HandleError,
  BRANCH_FACTOR,
  createTable,
  emptyTableData,
  slotAt,
} from './table';

export {
  type StorageLayout,
  type StorageData,
  type StorageOptions,
  type Storage,
  DEFAULT_MAX_GENERATION,
  createStorage,
} from './storage';
