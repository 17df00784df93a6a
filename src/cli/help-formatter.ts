/**
 * Shared Help Formatter for Consistent Colored Output
 */

import { Command } from 'commander';
import ansis from 'ansis';
import * as colors from './colors';

/**
 * Format description text with colors using ansis
 * Supports:
 * - Sentences ending with colons: bold cyan (section headers)
 * - File names and globs: highlighted in green
 * - Pipeline vocabulary: cyan
 */
function formatDescription(text: string): string {
  if (!text) return '';

  const sentences = text.match(/[^.!?]+[.!?:]+/g) || [text];
  let output = '';
  let lineLength = 0;
  const maxLineLength = 100;

  sentences.forEach((sentence, idx) => {
    sentence = sentence.trim();
    if (!sentence) return;

    // Section headers (end with colon) - new line and bold cyan
    if (sentence.endsWith(':')) {
      if (output && !output.endsWith('\n')) output += '\n';
      output += ansis.bold.cyan(sentence) + '\n';
      lineLength = 0;
      return;
    }

    let formatted = sentence;
    formatted = formatted.replace(/(\*\*\/\*\.\w+|\b\w+\.(json|svg|md)\b)/g, (match) => ansis.green(match));
    formatted = formatted.replace(/\b(bigrams?|unigrams?|vocabulary|co-occurrence|window|layout|stopwords?)\b/g,
      (match) => ansis.cyan(match));

    output += ansis.white(formatted);
    lineLength += sentence.length;

    if (lineLength > maxLineLength || (idx > 0 && idx % 2 === 0)) {
      output += '\n';
      lineLength = 0;
    } else {
      output += ' ';
    }
  });

  return output.trim();
}

/**
 * Wrap text to fit within a specific width, indenting continuation lines
 * Uses ansis.strip() to measure actual text length without color codes
 */
function wrapText(text: string, maxWidth: number, indent: string = ''): string {
  const words = text.split(' ');
  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    const testLine = currentLine ? currentLine + ' ' + word : word;

    if (ansis.strip(testLine).length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) {
        lines.push(currentLine);
      }
      currentLine = word;
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }

  return lines.map((line, idx) => idx === 0 ? line : indent + line).join('\n');
}

/**
 * Set both a terse summary (for command listings) and detailed description (for --help)
 */
export function setCommandHelp(cmd: Command, summary: string, description: string): Command {
  return cmd.summary(summary).description(description);
}

function colorTerm(part: string): string {
  if ((part.startsWith('<') && part.endsWith('>')) || (part.startsWith('[') && part.endsWith(']'))) {
    return colors.status.dim(part);
  }
  if (part.startsWith('-')) {
    return colors.ui.command(part);
  }
  return part;
}

function formatRow(term: string, coloredTerm: string, description: string, termWidth: number, availableWidth: number): string {
  const padding = ' '.repeat(Math.max(2, termWidth - term.length + 2));
  const leftColumnWidth = 2 + term.length + padding.length;
  const wrappedDesc = wrapText(
    colors.status.dim(description),
    availableWidth - leftColumnWidth,
    ' '.repeat(leftColumnWidth)
  );
  return '  ' + coloredTerm + padding + wrappedDesc + '\n';
}

/**
 * Configure colored help for a command
 */
export function configureColoredHelp(cmd: Command): void {
  cmd.configureHelp({
    formatHelp: (command, helper) => {
      const termWidth = helper.padWidth(command, helper);
      const availableWidth = process.stdout.columns || 100;
      let output = '';

      output += colors.ui.key('Usage: ') +
                colors.ui.value(helper.commandUsage(command).replace('Usage: ', '')) + '\n\n';

      const desc = helper.commandDescription(command);
      if (desc) {
        output += formatDescription(desc) + '\n\n';
      }

      const args = helper.visibleArguments(command);
      if (args.length > 0) {
        output += colors.ui.header('Arguments') + '\n';
        for (const arg of args) {
          const name = helper.argumentTerm(arg);
          output += formatRow(name, colorTerm(name), helper.argumentDescription(arg), termWidth, availableWidth);
        }
        output += '\n';
      }

      const opts = helper.visibleOptions(command);
      if (opts.length > 0) {
        output += colors.ui.header('Options') + '\n';
        for (const option of opts) {
          const flags = helper.optionTerm(option);
          const coloredFlags = flags.split(/\s+/).map(colorTerm).join(' ');
          output += formatRow(flags, coloredFlags, helper.optionDescription(option), termWidth, availableWidth);
        }
        output += '\n';
      }

      // subcommandDescription prefers the terse summary
      const commands = helper.visibleCommands(command);
      if (commands.length > 0) {
        output += colors.ui.header('Commands') + '\n';
        for (const subcommand of commands) {
          const name = helper.subcommandTerm(subcommand);
          const coloredName = name
            .split(/\s+/)
            .map(part => part.startsWith('[') || part.startsWith('<') ? colors.status.dim(part) : colors.ui.command(part))
            .join(' ');
          output += formatRow(name, coloredName, helper.subcommandDescription(subcommand), termWidth, availableWidth);
        }
      }

      return output;
    }
  });
}
