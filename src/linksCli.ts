/**
 * Command line surface of `html-extract-links`
 */

import { parseArgs } from 'util';
import { defaultStreams, isParseArgsError, logFailure, reportFailure } from './cli';
import type { CliStreams } from './cli';
import { UsageError } from './errors';
import { htmlExtractLinks } from './index';
import { cliLogger } from './logger';
import { LINKS_PROGRAM_NAME, linksHelpText, printHelp } from './ui';

export interface LinksCliOptions {
  input?: string;
  output?: string;
  parser?: string;
  help: boolean;
}

const readArgv = (argv: readonly string[]) => {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        output: { type: 'string', short: 'O' },
        parser: { type: 'string', short: 'p' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new UsageError(error.message);
    }
    throw error;
  }
};

export const parseLinksArgs = (argv: readonly string[]): LinksCliOptions => {
  const { values, positionals } = readArgv(argv);
  if (positionals.length > 1) {
    throw new UsageError(`unexpected argument '${positionals[1]}'`);
  }

  return {
    input: positionals[0],
    output: values.output,
    parser: values.parser,
    help: values.help ?? false,
  };
};

/**
 * Run `html-extract-links` and resolve to the exit status
 */
export const runLinks = async (
  argv: readonly string[],
  streams: CliStreams = defaultStreams()
): Promise<number> => {
  let options: LinksCliOptions;
  try {
    options = parseLinksArgs(argv);
  } catch (error) {
    return reportFailure(streams.stderr, error, undefined, LINKS_PROGRAM_NAME);
  }

  if (options.help) {
    printHelp(streams.stdout, linksHelpText());
    return 0;
  }

  try {
    cliLogger.debug('Arguments parsed', { ...options });

    await htmlExtractLinks({
      input: options.input ?? streams.stdin,
      output: options.output ?? streams.stdout,
      parser: options.parser,
    });

    return 0;
  } catch (error) {
    logFailure(error);
    return reportFailure(streams.stderr, error, options.input, LINKS_PROGRAM_NAME);
  }
};
