/**
 * Run Pipeline Use Case
 *
 * One end-to-end run: read and normalize every source, resolve the entity
 * hierarchy, reconcile, build views, check and publish.
 */

import { err, ok, type Result } from 'neverthrow';

import { buildViews } from '../../../aggregation/index.js';
import { buildArtifactFiles } from '../../../artifacts/index.js';
import { resolveHierarchy } from '../../../hierarchy/index.js';
import { mergeExtracts, normalizeExtract } from '../../../normalizer/index.js';
import { assertQualityChecks, runQualityChecks } from '../../../quality-checks/index.js';
import { reconcile } from '../../../reconciliation/index.js';

import type { ArtifactStore, RunReport } from '../../../artifacts/index.js';
import type { Entity } from '../../../hierarchy/index.js';
import type {
  ExtractReader,
  ExtractReadError,
  NormalizeError,
  NormalizedExtract,
} from '../../../normalizer/index.js';
import type { EntityKind, PipelineConfig } from '../../../pipeline-config/index.js';
import type { PipelineError } from '../errors.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunPipelineDeps {
  extractReader: ExtractReader;
  artifactStore: ArtifactStore;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const countByKind = (entities: readonly Entity[]): Record<EntityKind, number> => {
  const counts: Record<EntityKind, number> = { fund: 0, department: 0, program: 0, line_item: 0 };
  for (const entity of entities) {
    counts[entity.kind] += 1;
  }
  return counts;
};

const readSources = async (
  deps: RunPipelineDeps,
  config: PipelineConfig
): Promise<Result<NormalizedExtract, ExtractReadError | NormalizeError>[]> =>
  Promise.all(
    config.sources.map(async (source, index) => {
      const raw = await deps.extractReader.read(source);
      return raw.andThen((extract) => normalizeExtract(extract, source, index));
    })
  );

/**
 * Runs the whole pipeline. On any fatal error nothing is published and the
 * previous output set stays in place.
 */
export const runPipeline = async (
  deps: RunPipelineDeps,
  config: PipelineConfig
): Promise<Result<RunReport, PipelineError>> => {
  const log = deps.logger.child({ usecase: 'runPipeline' });

  log.info({ sources: config.sources.length, views: config.views.length }, 'Starting run');

  // Sources are independent; results come back in declaration order
  const normalized = await readSources(deps, config);
  const extracts: NormalizedExtract[] = [];
  for (const result of normalized) {
    if (result.isErr()) {
      log.error({ error: result.error }, 'Failed to load source');
      return err(result.error);
    }
    extracts.push(result.value);
    log.info(
      {
        source: result.value.sourceId,
        records: result.value.records.length,
        skippedRows: result.value.skippedRows,
        unmatchedColumns: result.value.unmatchedColumns,
      },
      'Normalized source'
    );
  }

  const records = mergeExtracts(extracts);
  const resolution = resolveHierarchy(records, config.hierarchy);
  for (const conflict of resolution.conflicts) {
    log.warn(
      { entityKey: conflict.entityKey, parents: conflict.parents },
      conflict.message
    );
  }
  log.info(
    {
      records: records.length,
      entities: resolution.entities.length,
      aliasLinks: resolution.aliasLinks.length,
      conflicts: resolution.conflicts.length,
    },
    'Resolved hierarchy'
  );

  const reconciled = reconcile(resolution.records, resolution.entities, config.reconciliation);
  if (reconciled.isErr()) {
    log.error({ error: reconciled.error }, 'Reconciliation failed');
    return err(reconciled.error);
  }
  const { facts, stats } = reconciled.value;
  log.info(
    {
      leafFacts: stats.leafFacts,
      rollupFacts: stats.rollupFacts,
      excludedBudgetRecords: stats.excludedBudgetRecords,
    },
    'Reconciled facts'
  );

  const viewsResult = buildViews(facts, resolution.entities, config.views);
  if (viewsResult.isErr()) {
    log.error({ error: viewsResult.error }, 'Failed to build views');
    return err(viewsResult.error);
  }
  const views = viewsResult.value;

  const checks = runQualityChecks(
    { entities: resolution.entities, facts, views, stats },
    config.qualityChecks
  );
  for (const check of checks) {
    if (check.status === 'warn') {
      log.warn({ check: check.name, details: check.details }, check.message);
    }
  }
  const asserted = assertQualityChecks(checks);
  if (asserted.isErr()) {
    log.error({ error: asserted.error }, 'Quality checks failed');
    return err(asserted.error);
  }

  const report: RunReport = {
    sources: extracts.map((extract) => ({
      id: extract.sourceId,
      file: extract.file,
      records: extract.records.length,
      skippedRows: extract.skippedRows,
      unmatchedColumns: extract.unmatchedColumns,
    })),
    records: {
      normalized: records.length,
      used: stats.recordsUsed,
      skipped: extracts.reduce((total, extract) => total + extract.skippedRows, 0),
      excludedBudget: stats.excludedBudgetRecords,
    },
    fiscalYears: [...new Set(records.map((record) => record.fiscalYear))].sort((a, b) => a - b),
    entities: countByKind(resolution.entities),
    facts: { leaf: stats.leafFacts, rollup: stats.rollupFacts },
    budgetCyclesByYear: stats.budgetCyclesByYear,
    aliasLinks: resolution.aliasLinks,
    conflicts: resolution.conflicts,
    views: views.map((view) => ({ name: view.name, rows: view.rows.length, maxRows: view.maxRows })),
    qualityChecks: checks,
  };

  const files = buildArtifactFiles({
    entities: resolution.entities,
    codeMappings: resolution.codeMappings,
    facts,
    views,
    report,
  });

  const published = await deps.artifactStore.publish(files);
  if (published.isErr()) {
    log.error({ error: published.error }, 'Failed to publish artifacts');
    return err(published.error);
  }

  log.info(
    { written: published.value.written.length, removedViews: published.value.removed },
    'Published artifacts'
  );

  return ok(report);
};
