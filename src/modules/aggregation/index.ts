export { buildView, buildViews } from './core/build-views.js';
export { createEntityContext, dimensionColumns, dimensionValues } from './core/dimensions.js';
export type { DimensionValue, EntityContext } from './core/dimensions.js';
export type { AggregateView, ViewCell, ViewRow } from './core/types.js';
