export { createViewRepo, type ViewRepo, type ViewRepoOptions } from './shell/fs-view-repo.js';
export { queryView, getFilterOptions, tableRows } from './core/query.js';
export type {
  ViewQuery,
  ViewQueryRow,
  ViewQuerySort,
  FilterOptions,
  EntityOption,
} from './core/types.js';
export type { ViewRepoError, ViewQueryError } from './core/errors.js';
