import * as dotenv from 'dotenv';
import {
  ClassificationAgent,
  ClassificationCache,
  ClassificationOrchestrator,
  ExtractorManager,
  OutputFormatter,
  StandardsAgent,
  configureSettings,
  createLLMClient,
  getActiveTaxonomy,
  getProviderDisplayName,
  getSettings,
  resetTaxonomy,
} from '@docpath/core';
import { CliUsageError, USAGE, parseCliArguments, type CliOptions } from './arguments';
import { collectFiles } from './files';

/**
 * stdout carries only results. Progress and pipeline errors go to stderr with --verbose;
 * warnings always do. Failed files are reported by run() either way.
 */
function routeLogs(verbose: boolean): void {
  const toStderr = console.error.bind(console);
  const quiet = (): void => undefined;
  console.log = verbose ? toStderr : quiet;
  console.info = verbose ? toStderr : quiet;
  console.error = verbose ? toStderr : quiet;
}

function applyOptions(options: CliOptions): void {
  configureSettings({
    ...(options.style ? { namingStyle: options.style } : {}),
    ...(options.taxonomy ? { taxonomyFile: options.taxonomy } : {}),
    ...(options.strictMode !== undefined ? { taxonomyStrictMode: options.strictMode } : {}),
  });
  // Rebuilt from the settings above on next access
  resetTaxonomy();
}

export async function run(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArguments(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`docpath: ${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  dotenv.config();
  routeLogs(options.verbose);
  applyOptions(options);

  const llmClient = createLLMClient();
  if (!llmClient) {
    process.stderr.write('docpath: no LLM API key configured. Set OPENROUTER_API_KEY or OPENAI_API_KEY.\n');
    return 2;
  }
  console.log(`[CLI] Using ${getProviderDisplayName(llmClient.getProvider())} (${llmClient.getModel()})`);

  const settings = getSettings();
  const taxonomy = getActiveTaxonomy();
  console.log(`[CLI] Taxonomy '${taxonomy.name}' v${taxonomy.version}`);
  const extractor = new ExtractorManager(settings.extraction);

  let files: string[];
  try {
    files = await collectFiles(options.inputs, extractor.getSupportedExtensions());
  } catch (error) {
    process.stderr.write(`docpath: ${error instanceof Error ? error.message : String(error)}\n`);
    return 2;
  }
  if (files.length === 0) {
    process.stderr.write('docpath: no supported files found\n');
    return 1;
  }

  const cache = options.cache ? new ClassificationCache(settings.dbPath) : null;
  try {
    const orchestrator = new ClassificationOrchestrator({
      extractor,
      classifier: new ClassificationAgent(llmClient, taxonomy),
      standardizer: new StandardsAgent(llmClient, taxonomy),
      cache,
      taxonomy,
    });

    const { results, failures } = await orchestrator.classifyFiles(files);

    const output = new OutputFormatter(options.format).formatBatch(results);
    if (output) {
      process.stdout.write(`${output}\n`);
    }
    for (const failure of failures) {
      process.stderr.write(`docpath: ${failure.file}: ${failure.error}\n`);
    }
    return failures.length > 0 ? 1 : 0;
  } finally {
    cache?.close();
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`docpath: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
      process.exitCode = 1;
    }
  );
}
