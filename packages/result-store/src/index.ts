/**
 * @reelscope/result-store
 *
 * CSV result store, legacy migration and work-list reading.
 */

export { CsvResultStore } from './csv-store.js';
export type { CsvResultStoreOptions } from './csv-store.js';

export { MemoryResultStore } from './memory-store.js';

export {
  migrateStore,
  isLegacyHeader,
  storeHeader,
  writeStoreFile,
} from './migration.js';
export type { MigrationKind, MigrationReport, MigrationOptions } from './migration.js';

export { readWorkList, dedupeKeys } from './work-list.js';
export type { WorkListOptions } from './work-list.js';

export { parseCsvRecords, formatCsvRecords } from './csv-format.js';
