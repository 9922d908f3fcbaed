/**
 * Terminal output for the CLI
 */

import chalk from 'chalk';
import type { Writable } from 'stream';
import { PARSER_ALIASES, PARSER_IDS, DEFAULT_PARSER } from './parsers';

export const PROGRAM_NAME = 'html-deltags';

export const LINKS_PROGRAM_NAME = 'html-extract-links';

const heading = (text: string) => chalk.bold(text);

/**
 * Usage text shown for -h/--help
 */
export const helpText = (): string => {
  const aliases = Object.entries(PARSER_ALIASES)
    .map(([alias, id]) => `${alias} → ${id}`)
    .join(', ');

  return [
    `${chalk.bold.cyan(PROGRAM_NAME)} - remove tags and comments from HTML, then print it minified`,
    '',
    heading('Usage:'),
    `  ${PROGRAM_NAME} [options] [input_file]`,
    '',
    heading('Arguments:'),
    '  input_file                 HTML file to process (reads stdin when omitted)',
    '',
    heading('Options:'),
    '  -O, --output <file>        Write the result to <file> instead of stdout',
    '  -d, --delete <tag,tag>     Tags to remove, comma-separated; repeatable',
    "  -k, --kw-delete '<tag> <keyword>'",
    '                             Remove <tag> elements containing <keyword>; repeatable',
    `  -p, --parser <name>        ${PARSER_IDS.join(' | ')} (default: ${DEFAULT_PARSER})`,
    '  -s, --kw-scope <scope>     Where -k looks: text | class | attributes (default: text)',
    '  -h, --help                 Show this help and exit',
    '',
    heading('Parsers:'),
    '  jsdom is the most standards-conformant and the slowest; htmlparser2 is the',
    '  fastest but does not add the implied html/head/body elements.',
    chalk.dim(`  Aliases: ${aliases}`),
    '',
    heading('Examples:'),
    `  ${PROGRAM_NAME} my.html -d head,nav`,
    `  ${PROGRAM_NAME} -d head,nav < my.html > mynew.html`,
    `  ${PROGRAM_NAME} my.html -d head,nav -d svg,path -O mynew.html`,
    `  ${PROGRAM_NAME} my.html -k 'div Sponsored content'`,
    '',
  ].join('\n');
};

export const linksHelpText = (): string =>
  [
    `${chalk.bold.cyan(LINKS_PROGRAM_NAME)} - print the links of an HTML document`,
    '',
    heading('Usage:'),
    `  ${LINKS_PROGRAM_NAME} [options] [input_file]`,
    '',
    heading('Options:'),
    '  -O, --output <file>        Write the links to <file> instead of stdout',
    `  -p, --parser <name>        ${PARSER_IDS.join(' | ')} (default: ${DEFAULT_PARSER})`,
    '  -h, --help                 Show this help and exit',
    '',
    heading('Output:'),
    '  One line per <a> with text: Link: [text](href)',
    '',
  ].join('\n');

export const printHelp = (stream: Writable, text = helpText()) => {
  stream.write(text);
};

/**
 * Print an error line, e.g. `html-deltags: error: unknown parser 'x'`
 */
export const printError = (stream: Writable, error: Error | string, program = PROGRAM_NAME) => {
  const message = error instanceof Error ? error.message : error;
  stream.write(`${program}: ${chalk.red('error:')} ${message}\n`);
};
