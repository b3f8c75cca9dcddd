import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadPipelineConfig } from '@/modules/pipeline-config/index.js';

const makeTempDir = async (): Promise<string> => mkdtemp(path.join(tmpdir(), 'pipeline-config-'));

describe('loadPipelineConfig', () => {
  it('loads and validates a YAML file', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'pipeline.yaml');
    await writeFile(
      filePath,
      `sources:
  - id: ledger
    file: ledger.csv
    delimiter: ";"
    columns:
      Year: fiscal_year
      Amount: amount
views:
  - name: by_year
    level: line_item
    dimensions: [fiscal_year]
`,
      'utf8'
    );

    const result = await loadPipelineConfig(filePath);

    const config = result._unsafeUnwrap();
    expect(config.sources[0]?.delimiter).toBe(';');
    expect(config.sources[0]?.columns).toEqual({ Year: 'fiscal_year', Amount: 'amount' });
    expect(config.views.map((view) => view.name)).toEqual(['by_year']);
  });

  it('returns NotFound for a missing file', async () => {
    const dir = await makeTempDir();

    const result = await loadPipelineConfig(path.join(dir, 'missing.yaml'));

    expect(result._unsafeUnwrapErr().type).toBe('NotFound');
  });

  it('returns ParseError for malformed YAML', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'broken.yaml');
    await writeFile(filePath, 'sources: [unclosed\n', 'utf8');

    const result = await loadPipelineConfig(filePath);

    expect(result._unsafeUnwrapErr().type).toBe('ParseError');
  });

  it('loads the bundled sample configuration', async () => {
    const result = await loadPipelineConfig(path.resolve('config/pipeline.yaml'));

    const config = result._unsafeUnwrap();
    expect(config.sources.map((source) => source.id)).toEqual([
      'ledger_2022_2023',
      'budget_2024',
      'actuals_2024',
    ]);
    expect(config.views).toHaveLength(6);
  });
});
