#!/usr/bin/env node

import { writeFile } from 'fs/promises';
import { parseArgs } from 'util';
import { APP_NAME, APP_VERSION } from './config/constants';
import { getEnvironment, getTextGeneratorSettings } from './config/environment';
import { isAnalysisError } from './core/analysis/qualityAnalyzer';
import { createTextGenerator, type TextGenerator } from './core/generation/textGenerator';
import { exportRecords } from './core/output/exporter';
import { formatTable } from './core/output/formatter';
import { processDocument } from './services/documentProcessor';
import { logger } from './utils/logger';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Extract structured post records from a saved LinkedIn feed page (.mhtml).

Usage: ${APP_NAME} <file.mhtml> [options]

Options:
  --enhance          Add Company and Location with the configured language model
  --ai               Let the language model find posts instead of CSS selectors
  --format <fmt>     Output format: table (default), csv, json
  --output, -o <p>   Write the csv/json export to a file instead of stdout
  --help, -h         Show help
  --version          Show version

Environment:
  LLM_SERVER_URL     OpenAI-compatible API base URL (required for --enhance/--ai)
  LLM_API_KEY        API key for the language model server
  LLM_MODEL_NAME     Model name (default: gpt-4o-mini)

Examples:
  ${APP_NAME} feed.mhtml
  ${APP_NAME} feed.mhtml --format csv --output posts.csv
  ${APP_NAME} feed.mhtml --enhance --format json
`;

const OUTPUT_FORMATS = ['table', 'csv', 'json'] as const;
type OutputFormat = (typeof OUTPUT_FORMATS)[number];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function parseCliArgs() {
  try {
    return parseArgs({
      args: process.argv.slice(2),
      options: {
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
        enhance: { type: 'boolean' },
        ai: { type: 'boolean' },
        format: { type: 'string' },
        output: { type: 'string', short: 'o' },
      },
      allowPositionals: true,
    });
  } catch (error) {
    logger.error({ error }, 'Invalid command line arguments');
    console.error('Error parsing arguments. Use --help for usage information.');
    process.exit(1);
  }
}

async function buildTextGenerator(): Promise<TextGenerator | null> {
  const settings = getTextGeneratorSettings();
  if (!settings) {
    return null;
  }
  return createTextGenerator({ type: 'http', ...settings });
}

async function main(): Promise<void> {
  const { values, positionals } = parseCliArgs();

  if (values.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (values.version) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    process.exit(0);
  }

  const filePath = positionals[0];
  if (!filePath) {
    console.error('Missing archive path. Use --help for usage information.');
    process.exit(1);
  }

  const format = values.format ?? 'table';
  if (!isOutputFormat(format)) {
    console.error(`Unknown format: ${format}. Expected one of ${OUTPUT_FORMATS.join(', ')}.`);
    process.exit(1);
  }

  getEnvironment(); // Validate environment variables
  const wantsModel = Boolean(values.enhance || values.ai);
  const textGenerator = wantsModel ? await buildTextGenerator() : null;

  const result = await processDocument(filePath, {
    useAi: values.ai,
    enhance: values.enhance,
    textGenerator,
    aiCharLimit: getEnvironment().AI_INPUT_CHAR_LIMIT,
  });

  if (!result.success) {
    console.error(`❌ ${result.error} (${result.filePath})`);
    process.exit(result.status === 'no_content' ? 2 : 1);
  }

  if (format === 'table') {
    console.log('=== EXTRACTION RESULTS ===');
    console.log(`Total posts extracted: ${result.summary.totalPosts}`);
    if (isAnalysisError(result.analysis)) {
      console.log(`Analysis: ${result.analysis.error}`);
    } else {
      console.log(`Data quality score: ${result.analysis.dataQualityScore}%`);
      console.log(`Insights: ${result.analysis.insights.join(', ')}`);
      for (const recommendation of result.analysis.recommendations) {
        console.log(`💡 ${recommendation}`);
      }
    }
    console.log('\n=== EXTRACTED DATA ===');
    console.log(formatTable(result.records));
    return;
  }

  const exported = exportRecords(result.records, format);
  if (values.output) {
    await writeFile(values.output, exported, 'utf-8');
    console.error(`✅ Exported ${result.records.length} records to ${values.output}`);
  } else {
    console.log(exported);
  }
}

// Run the CLI
main().catch(error => {
  logger.error({ error }, 'CLI execution failed');
  console.error(`Fatal error: ${error instanceof Error ? error.message : 'unknown error'}`);
  process.exit(1);
});
