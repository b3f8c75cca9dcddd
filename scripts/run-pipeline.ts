import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createChildLogger, createLogger } from '../src/infra/logger/index.js';
import { createFsArtifactStore } from '../src/modules/artifacts/index.js';
import { createCsvExtractReader } from '../src/modules/normalizer/index.js';
import { loadPipelineConfig } from '../src/modules/pipeline-config/index.js';
import { runPipeline, type PipelineError } from '../src/modules/pipeline/index.js';

const describeFailure = (error: PipelineError): string => {
  if (error.type === 'QualityCheckError') {
    const lines = error.failures.flatMap((failure) => [
      `${failure.name}: ${failure.message}`,
      ...failure.details.map((detail) => `  - ${detail}`),
    ]);
    return `${error.message}\n${lines.join('\n')}`;
  }
  return `${error.type}: ${error.message}`;
};

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger(config.logger);
  const log = createChildLogger(logger, { script: 'run-pipeline' });

  const pipelineConfig = await loadPipelineConfig(config.pipeline.configPath);
  if (pipelineConfig.isErr()) {
    const { error } = pipelineConfig;
    const details = 'details' in error && error.details !== undefined ? error.details : [];
    console.error([`${error.type}: ${error.message}`, ...details.map((d) => `  - ${d}`)].join('\n'));
    process.exit(1);
  }

  log.info(
    { configPath: config.pipeline.configPath, outputDir: config.pipeline.outputDir },
    'Loaded pipeline configuration'
  );

  const result = await runPipeline(
    {
      extractReader: createCsvExtractReader({ inputDir: config.pipeline.inputDir }),
      artifactStore: createFsArtifactStore({ rootDir: config.pipeline.outputDir }),
      logger,
    },
    pipelineConfig.value
  );

  if (result.isErr()) {
    console.error(describeFailure(result.error));
    process.exit(1);
  }

  const report = result.value;
  console.log(
    `Published ${String(report.facts.leaf + report.facts.rollup)} facts and ${String(report.views.length)} view(s) to ${config.pipeline.outputDir}.`
  );
};

await main().catch((error: unknown) => {
  console.error((error as Error).message);
  process.exit(1);
});
