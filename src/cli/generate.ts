/**
 * Generate command
 *
 * Discovers documents, builds the concept graph and writes graph.json and
 * graph.svg. Unreadable documents only produce a warning; configuration and
 * output failures abort with exit code 1.
 */

import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import { buildConceptGraph } from '../graph/pipeline';
import { summarizeGraph } from '../graph/serialize';
import { DEFAULT_STOPWORDS, loadStopwords } from '../graph/stopwords';
import { DEFAULT_OUT_DIR, DEFAULT_ROOT, loadConfigFile, resolveToolConfig, type ToolConfig } from '../lib/config';
import { collectDocuments } from '../lib/discovery';
import { ConfigError, describeError } from '../lib/errors';
import { readDocumentText } from '../lib/extract';
import { writeArtifacts, type WrittenArtifacts } from '../lib/output';
import type { GraphSummary, LayoutStats, Logger } from '../types';
import * as colors from './colors';
import { separator } from './colors';
import { setCommandHelp } from './help-formatter';
import { createConsoleLogger } from './logger';

export interface GenerateOptions {
  config?: string;
  pattern?: string[];
  ignore?: string[];
  stopwords?: string;
  maxNodes?: number;
  window?: number;
  seed?: number;
  width?: number;
  height?: number;
  iterations?: number;
  json?: boolean;
  quiet?: boolean;
}

export interface GenerateReport {
  documents: number;
  distinctTerms: number;
  vocabulary: number;
  graph: GraphSummary;
  layout: LayoutStats;
  artifacts: WrittenArtifacts;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function resolveStopwords(config: ToolConfig): ReadonlySet<string> {
  if (!config.stopwords) {
    return DEFAULT_STOPWORDS;
  }
  try {
    return loadStopwords(config.stopwords);
  } catch (error) {
    throw new ConfigError(`Failed to load stopwords from ${config.stopwords}`, 'stopwords', { cause: error });
  }
}

/**
 * Merge defaults, the optional config file and command-line values
 */
export function buildToolConfig(root: string | undefined, outDir: string | undefined, options: GenerateOptions): ToolConfig {
  const fileLayer = options.config ? loadConfigFile(options.config) : undefined;

  return resolveToolConfig(fileLayer, {
    root,
    outDir,
    patterns: options.pattern,
    ignore: options.ignore,
    stopwords: options.stopwords,
    maxNodes: options.maxNodes,
    window: options.window,
    seed: options.seed,
    width: options.width,
    height: options.height,
    iterations: options.iterations,
  });
}

export function runGenerate(config: ToolConfig, logger: Logger): GenerateReport {
  const stopwords = resolveStopwords(config);
  const files = collectDocuments(config.root, config, logger);
  const texts = files.map(file => readDocumentText(file, logger));

  const result = buildConceptGraph(texts, stopwords, config);
  const artifacts = writeArtifacts(config.outDir, result.graph, config);

  return {
    documents: files.length,
    distinctTerms: result.distinctTerms,
    vocabulary: result.vocabulary.length,
    graph: summarizeGraph(result.graph),
    layout: result.layout,
    artifacts,
  };
}

function printReport(report: GenerateReport, logger: Logger): void {
  logger.info(`Wrote ${report.artifacts.svgPath}`);
  logger.info(`Wrote ${report.artifacts.jsonPath}`);

  logger.info('\n' + colors.stats.section('Concept Graph'));
  logger.info(separator());
  logger.info(`  ${colors.stats.label('Documents:')} ${colors.coloredCount(report.documents)}`);
  logger.info(`  ${colors.stats.label('Distinct terms:')} ${colors.coloredCount(report.distinctTerms)}`);
  logger.info(`  ${colors.stats.label('Nodes:')} ${colors.coloredCount(report.graph.nodes)}`);
  logger.info(`  ${colors.stats.label('Edges:')} ${colors.coloredCount(report.graph.edges)}`);
  logger.info(`  ${colors.stats.label('Layout iterations:')} ${colors.stats.value(String(report.layout.iterations))}`);

  const strongest = report.graph.strongest;
  if (strongest) {
    logger.info(
      `  ${colors.stats.label('Strongest pair:')} ${colors.coloredTerm(strongest.source)} ` +
      `${colors.term.link('↔')} ${colors.coloredTerm(strongest.target)} ${colors.term.weight(`(${strongest.weight})`)}`
    );
  }
  logger.info('');
}

export function createGenerateCommand(): Command {
  return setCommandHelp(
    new Command('generate'),
    'Build the concept graph (default command)',
    'Build a concept graph from markdown documents. Documents under the root matching the include patterns are converted to text, split into unigrams and bigrams, and the most frequent terms become nodes linked by co-occurrence within a sliding window. The layout is seeded, so an unchanged corpus renders the same picture. Writes graph.json and graph.svg into the output directory.'
  )
    .argument('[root]', `Directory of documents (default: ${DEFAULT_ROOT})`)
    .argument('[outDir]', `Output directory, created if missing (default: ${DEFAULT_OUT_DIR})`)
    .option('-c, --config <file>', 'JSON config file with graph and run settings')
    .option('--pattern <glob...>', 'Include patterns relative to the root (default: **/*.md)')
    .option('--ignore <glob...>', 'Ignore patterns relative to the root')
    .option('--stopwords <file>', 'Replacement stopword list (JSON array or one word per line)')
    .option('--max-nodes <n>', 'Vocabulary size (default: 30)', parseInteger)
    .option('--window <n>', 'Co-occurrence window (default: 12)', parseInteger)
    .option('--seed <n>', 'Layout seed (default: 37)', parseInteger)
    .option('--width <px>', 'Canvas width (default: 1200)', parseNumber)
    .option('--height <px>', 'Canvas height (default: 800)', parseNumber)
    .option('--iterations <n>', 'Maximum layout iterations (default: 400)', parseInteger)
    .option('--json', 'Print a machine-readable run summary')
    .option('-q, --quiet', 'Only print warnings and errors')
    .showHelpAfterError('(add --help for additional information)')
    .action((root: string | undefined, outDir: string | undefined, options: GenerateOptions) => {
      const logger = createConsoleLogger({ quiet: options.quiet || options.json });
      const spinner = process.stdout.isTTY && !options.quiet && !options.json
        ? ora('Building concept graph...').start()
        : undefined;

      try {
        const config = buildToolConfig(root, outDir, options);
        const report = runGenerate(config, logger);
        spinner?.succeed(`Graph built from ${report.documents} document${report.documents === 1 ? '' : 's'}`);

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          printReport(report, logger);
        }
      } catch (error) {
        spinner?.fail('Graph generation failed');
        logger.error(describeError(error));
        process.exit(1);
      }
    });
}
