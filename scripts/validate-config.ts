import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { loadPipelineConfig } from '../src/modules/pipeline-config/index.js';

const main = async (): Promise<void> => {
  const { pipeline } = createConfig(parseEnv(process.env));
  const configPath = process.argv[2] ?? pipeline.configPath;

  const result = await loadPipelineConfig(configPath);

  if (result.isErr()) {
    const { error } = result;
    console.error(`Pipeline configuration is invalid (${configPath}):\n`);
    console.error(`- ${error.type}: ${error.message}`);
    if ('details' in error && error.details !== undefined) {
      for (const detail of error.details) {
        console.error(`  - ${detail}`);
      }
    }
    process.exit(1);
  }

  const config = result.value;
  console.log(
    `Validated ${configPath}: ${String(config.sources.length)} source(s), ${String(config.views.length)} view(s).`
  );
};

await main().catch((error: unknown) => {
  console.error((error as Error).message);
  process.exit(1);
});
