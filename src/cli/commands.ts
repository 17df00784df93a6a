/**
 * CLI Command Registration
 */

import { Command } from 'commander';
import pkg from '../../package.json';
import { createGenerateCommand } from './generate';
import { configureColoredHelp } from './help-formatter';
import { createStopwordsCommand } from './stopwords';

export function registerCommands(program: Command): Command {
  program
    .name('concept-graph')
    .description('Turn a folder of markdown documents into a co-occurrence concept graph (graph.json + graph.svg)')
    .version(pkg.version)
    .showHelpAfterError('(add --help for additional information)')
    .showSuggestionAfterError();

  configureColoredHelp(program);

  // generate is the default, so `concept-graph <root> <outDir>` works bare
  const generate = createGenerateCommand();
  configureColoredHelp(generate);
  program.addCommand(generate, { isDefault: true });

  const stopwords = createStopwordsCommand();
  configureColoredHelp(stopwords);
  program.addCommand(stopwords);

  return program;
}
