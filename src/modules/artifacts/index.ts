export { createFsArtifactStore, type FsArtifactStoreOptions } from './shell/fs-artifact-store.js';
export {
  buildArtifactFiles,
  entitiesTable,
  entityCodesTable,
  factsTable,
  viewTable,
  toTable,
  serializeArtifact,
  VIEWS_DIR,
  type ArtifactSet,
} from './core/tables.js';
export { TableSchema, TableColumnSchema, TableCellSchema } from './core/types.js';
export type {
  Table,
  TableColumn,
  TableCell,
  RunReport,
  SourceSummary,
  ArtifactFile,
  PublishSummary,
} from './core/types.js';
export type { ArtifactStore } from './core/ports.js';
export { createWriteError, type WriteError } from './core/errors.js';
