/**
 * End-to-end runs over CSV files on disk, published to a temporary output directory.
 */

import { mkdtemp, readFile, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { Value } from '@sinclair/typebox/value';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { createFsArtifactStore, TableSchema, type Table } from '@/modules/artifacts/index.js';
import { createCsvExtractReader } from '@/modules/normalizer/index.js';
import { runPipeline } from '@/modules/pipeline/index.js';
import {
  loadPipelineConfig,
  type PipelineConfig,
  type ViewDefinition,
} from '@/modules/pipeline-config/index.js';
import { tableRows, type ViewQueryRow } from '@/modules/view-query/index.js';
import {
  LEDGER_HEADER,
  SYNTHETIC_HEADER,
  ledgerRow,
  makePipelineConfig,
  makeSource,
  makeSyntheticLedger,
  makeSyntheticSource,
  makeView,
  toCsv,
} from '@/tests/fixtures/builders.js';
import { makeTestLogger } from '@/tests/fixtures/fakes.js';

const makeTempDir = async (prefix: string): Promise<string> =>
  mkdtemp(path.join(tmpdir(), `${prefix}-`));

const parks = { dept: 'PR', deptName: 'Parks & Recreation' };
const parksRenamed = { dept: 'PKR', deptName: 'Parks and Recreation' };

const LEDGER_ROWS: string[][] = [
  ledgerRow({ year: 2022, ...parks, amount: '100' }),
  ledgerRow({ year: 2022, ...parks, type: 'actual', amount: '95' }),
  ledgerRow({ year: 2023, ...parks, amount: '110' }),
  ledgerRow({ year: 2023, ...parks, type: 'actual', amount: '120' }),
  ledgerRow({ year: 2024, ...parksRenamed, amount: '120' }),
  ledgerRow({ year: 2024, ...parksRenamed, type: 'actual', amount: '118' }),
  ledgerRow({ year: 2024, amount: '200' }),
  ledgerRow({ year: 2024, type: 'actual', amount: '0' }),
  ledgerRow({ year: 2024, lineItem: '5300', lineItemName: 'Equipment', amount: '50' }),
  ledgerRow({
    year: 2024,
    dept: 'LIB',
    deptName: 'Library',
    lineItem: '4300',
    lineItemName: 'Fines',
    category: 'revenue',
    type: 'actual',
    amount: '15',
  }),
];

const writeInput = async (
  header: readonly string[] = LEDGER_HEADER,
  rows: readonly string[][] = LEDGER_ROWS,
  file = 'ledger.csv'
): Promise<string> => {
  const dir = await makeTempDir('input');
  await writeFile(path.join(dir, file), toCsv(header, rows), 'utf8');
  return dir;
};

const run = (inputDir: string, outputDir: string, config: PipelineConfig) =>
  runPipeline(
    {
      extractReader: createCsvExtractReader({ inputDir }),
      artifactStore: createFsArtifactStore({ rootDir: outputDir }),
      logger: makeTestLogger(),
    },
    config
  );

/** Relative path → contents of every file in an output directory */
const readTree = async (dir: string): Promise<Record<string, string>> => {
  const tree: Record<string, string> = {};
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      for (const name of await readdir(path.join(dir, entry.name))) {
        tree[`${entry.name}/${name}`] = await readFile(path.join(dir, entry.name, name), 'utf8');
      }
    } else {
      tree[entry.name] = await readFile(path.join(dir, entry.name), 'utf8');
    }
  }
  return tree;
};

const readRows = async (filePath: string): Promise<ViewQueryRow[]> => {
  const parsed: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  if (!Value.Check(TableSchema, parsed)) {
    throw new Error(`${filePath} is not a table`);
  }
  const table: Table = parsed;
  return tableRows(table);
};

const ledgerViews: ViewDefinition[] = [
  makeView({ name: 'totals_by_year', dimensions: ['fiscal_year', 'category'] }),
  makeView({ name: 'departments', level: 'department', dimensions: ['department', 'fiscal_year'] }),
];

const ledgerConfig = (views: ViewDefinition[] = ledgerViews): PipelineConfig =>
  makePipelineConfig({ sources: [makeSource()], views });

describe('pipeline run', () => {
  it('publishes byte-identical outputs for identical inputs', async () => {
    const inputDir = await writeInput();
    const first = await makeTempDir('output');
    const second = await makeTempDir('output');

    (await run(inputDir, first, ledgerConfig()))._unsafeUnwrap();
    (await run(inputDir, second, ledgerConfig()))._unsafeUnwrap();

    const firstTree = await readTree(first);
    expect(Object.keys(firstTree).sort()).toEqual([
      'entities.json',
      'entity_codes.json',
      'facts.json',
      'run_report.json',
      'views/departments.json',
      'views/totals_by_year.json',
    ]);
    expect(await readTree(second)).toEqual(firstTree);
  });

  it('leaves the previous outputs untouched when a source lacks a required column', async () => {
    const outputDir = await makeTempDir('output');
    (await run(await writeInput(), outputDir, ledgerConfig()))._unsafeUnwrap();
    const before = await readTree(outputDir);

    const header = LEDGER_HEADER.filter((field) => field !== 'amount_type');
    const rows = LEDGER_ROWS.map((row) => row.filter((_, index) => index !== 10));
    const result = await run(await writeInput(header, rows), outputDir, ledgerConfig());

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('SchemaError');
    expect(error.message).toBe(
      "source 'ledger' (ledger.csv) is missing required column(s): amount_type"
    );
    expect(await readTree(outputDir)).toEqual(before);
  });

  it('drops views that are no longer configured', async () => {
    const inputDir = await writeInput();
    const outputDir = await makeTempDir('output');
    (await run(inputDir, outputDir, ledgerConfig()))._unsafeUnwrap();

    (await run(inputDir, outputDir, ledgerConfig(ledgerViews.slice(0, 1))))._unsafeUnwrap();

    expect(await readdir(path.join(outputDir, 'views'))).toEqual(['totals_by_year.json']);
  });

  it('tracks a renamed and recoded department as one entity', async () => {
    const outputDir = await makeTempDir('output');

    const report = (await run(await writeInput(), outputDir, ledgerConfig()))._unsafeUnwrap();

    const entities = await readRows(path.join(outputDir, 'entities.json'));
    const parksEntity = entities.find((row) => row['entity_key'] === 'department:PR');
    expect(parksEntity).toMatchObject({
      kind: 'department',
      code: 'PKR',
      name: 'Parks and Recreation',
      first_fiscal_year: 2022,
      last_fiscal_year: 2024,
    });
    expect(report.entities.department).toBe(3);

    const facts = await readRows(path.join(outputDir, 'facts.json'));
    const parksYears = facts
      .filter((row) => row['entity_key'] === 'department:PR')
      .map((row) => row['fiscal_year']);
    expect(parksYears).toEqual([2022, 2023, 2024]);

    const links = report.aliasLinks.filter((link) => link.kind === 'department');
    expect(links).toHaveLength(1);
    expect(links[0]?.entityKey).toBe('department:PR');
    expect(links[0]?.reason).toBe('name');
  });

  it('keeps every roll-up equal to the sum of its line items', async () => {
    const outputDir = await makeTempDir('output');

    const report = (await run(await writeInput(), outputDir, ledgerConfig()))._unsafeUnwrap();

    const facts = await readRows(path.join(outputDir, 'facts.json'));
    const inYear = facts.filter(
      (row) => row['fiscal_year'] === 2024 && row['category'] === 'expenditure'
    );
    const leafBudget = inYear
      .filter((row) => row['entity_kind'] === 'line_item')
      .reduce((total, row) => total.plus(String(row['budgeted'] ?? '0')), new Decimal(0));
    const fund = inYear.find((row) => row['entity_key'] === 'fund:100');

    expect(leafBudget.toFixed(2)).toBe('370.00');
    expect(fund?.['budgeted']).toBe('370.00');
    expect(fund?.['actual']).toBe('118.00');
    expect(report.qualityChecks.find((check) => check.name === 'rollup_invariant')?.status).toBe(
      'pass'
    );
  });

  it('keeps a zero actual apart from a missing one', async () => {
    const outputDir = await makeTempDir('output');
    (await run(await writeInput(), outputDir, ledgerConfig()))._unsafeUnwrap();

    const facts = await readRows(path.join(outputDir, 'facts.json'));
    const fact = (key: string) =>
      facts.find((row) => row['fiscal_year'] === 2024 && row['entity_key'] === key);

    expect(fact('department:FIR/line_item:5100')).toMatchObject({
      budgeted: '200.00',
      actual: '0.00',
      variance: '-200.00',
      classification: 'underspend',
    });
    expect(fact('department:FIR/line_item:5300')).toMatchObject({
      budgeted: '50.00',
      actual: null,
      variance: null,
      classification: 'missing_actual',
    });
    expect(fact('department:LIB/line_item:4300')).toMatchObject({
      budgeted: null,
      actual: '15.00',
      variance: null,
      classification: 'missing_budget',
    });
  });
});

describe('pipeline run over a synthetic five-year ledger', () => {
  const writeSynthetic = () =>
    writeInput(SYNTHETIC_HEADER, makeSyntheticLedger().rows, 'synthetic.csv');

  const syntheticConfig = (views: ViewDefinition[]): PipelineConfig =>
    makePipelineConfig({ sources: [makeSyntheticSource()], views });

  it('refuses a department by year view instead of truncating it', async () => {
    const outputDir = await makeTempDir('output');
    const config = syntheticConfig([
      makeView({ name: 'by_year', dimensions: ['fiscal_year'] }),
      makeView({
        name: 'department_years',
        level: 'department',
        dimensions: ['department', 'fiscal_year'],
      }),
    ]);

    const error = (await run(await writeSynthetic(), outputDir, config))._unsafeUnwrapErr();

    expect(error.type).toBe('ConfigurationError');
    expect(error.message).toBe(
      "View 'department_years' groups into 100 rows, above its maxRows of 50; narrow its dimensions or filter"
    );
    expect(await readdir(outputDir)).toEqual([]);
  });

  it('publishes summary views within their bounds', async () => {
    const outputDir = await makeTempDir('output');
    const config = syntheticConfig([
      makeView({ name: 'by_year', dimensions: ['fiscal_year', 'category'] }),
      makeView({
        name: 'latest_departments',
        level: 'department',
        dimensions: ['department'],
        filter: { category: 'expenditure', fiscalYear: { latest: 1 } },
      }),
      makeView({
        name: 'districts',
        level: 'department',
        dimensions: ['district', 'fiscal_year'],
        maxRows: 25,
      }),
    ]);

    const report = (await run(await writeSynthetic(), outputDir, config))._unsafeUnwrap();

    expect(report.views).toEqual([
      { name: 'by_year', rows: 10, maxRows: 50 },
      { name: 'latest_departments', rows: 20, maxRows: 50 },
      { name: 'districts', rows: 25, maxRows: 25 },
    ]);
    expect(report.fiscalYears).toEqual([2020, 2021, 2022, 2023, 2024]);
    expect(report.entities).toEqual({ fund: 2, department: 20, program: 20, line_item: 40 });

    const byYear = await readRows(path.join(outputDir, 'views', 'by_year.json'));
    // 2020 expenditure: sum of 1000d over d = 1..20
    expect(byYear[0]).toEqual({
      fiscal_year: 2020,
      category: 'expenditure',
      budgeted: '210000.00',
      actual: '210210.00',
      variance: '210.00',
    });
  });
});

describe('bundled sample configuration', () => {
  it('runs end to end', async () => {
    const configPath = path.resolve('config/pipeline.yaml');
    const config = (await loadPipelineConfig(configPath))._unsafeUnwrap();
    const outputDir = await makeTempDir('output');

    const report = (await run(path.dirname(configPath), outputDir, config))._unsafeUnwrap();

    expect(report.fiscalYears).toEqual([2022, 2023, 2024]);
    expect(report.records.skipped).toBe(1);
    expect(report.views.map((view) => view.name)).toEqual([
      'totals_by_year',
      'department_totals',
      'service_area_by_year',
      'fund_by_year',
      'classification_by_year',
      'district_by_year',
    ]);
    expect(report.qualityChecks.some((check) => check.status === 'fail')).toBe(false);

    const entities = await readRows(path.join(outputDir, 'entities.json'));
    expect(entities.find((row) => row['entity_key'] === 'department:PR')).toMatchObject({
      code: 'PKR',
      name: 'Parks and Recreation',
      service_area: 'Culture & Recreation',
    });
  });
});
