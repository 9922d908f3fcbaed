/**
 * Command line surface
 *
 * Parses arguments, runs {@link htmlDeltags} and maps every failure to one
 * error line on stderr and exit status 1. Nothing reaches the output when a
 * run fails.
 */

import { parseArgs } from 'util';
import type { Readable, Writable } from 'stream';
import { z } from 'zod';
import { htmlDeltags } from './index';
import { keywordScopes } from './deltags/types';
import type { KeywordScope } from './deltags/types';
import { ConfigError, UsageError } from './errors';
import { cliLogger } from './logger';
import { printError, printHelp } from './ui';

export interface CliOptions {
  input?: string;
  output?: string;
  deleteTags: string[];
  keywordRules: string[];
  parser?: string;
  keywordScope?: KeywordScope;
  help: boolean;
}

export interface CliStreams {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

const keywordScopeSchema = z.enum(keywordScopes, {
  errorMap: () => ({ message: `--kw-scope must be one of: ${keywordScopes.join(', ')}` }),
});

export const isParseArgsError = (error: unknown): error is Error & { code: string } =>
  error instanceof Error &&
  'code' in error &&
  typeof error.code === 'string' &&
  error.code.startsWith('ERR_PARSE_ARGS');

const readArgv = (argv: readonly string[]) => {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        output: { type: 'string', short: 'O' },
        delete: { type: 'string', short: 'd', multiple: true },
        'kw-delete': { type: 'string', short: 'k', multiple: true },
        parser: { type: 'string', short: 'p' },
        'kw-scope': { type: 'string', short: 's' },
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

/**
 * Turn argv (without the node and script entries) into options.
 * Throws UsageError on anything malformed.
 */
export const parseCliArgs = (argv: readonly string[]): CliOptions => {
  const { values, positionals } = readArgv(argv);

  if (positionals.length > 1) {
    throw new UsageError(`unexpected argument '${positionals[1]}'`);
  }

  let keywordScope: KeywordScope | undefined;
  if (values['kw-scope'] !== undefined) {
    const result = keywordScopeSchema.safeParse(values['kw-scope']);
    if (!result.success) {
      throw new UsageError(result.error.issues[0].message);
    }
    keywordScope = result.data;
  }

  return {
    input: positionals[0],
    output: values.output,
    deleteTags: values.delete ?? [],
    keywordRules: values['kw-delete'] ?? [],
    parser: values.parser,
    keywordScope,
    help: values.help ?? false,
  };
};

const isMissingFile = (error: unknown): error is NodeJS.ErrnoException & { path: string } =>
  error instanceof Error &&
  'code' in error &&
  error.code === 'ENOENT' &&
  'path' in error &&
  typeof error.path === 'string';

/**
 * Print the error line for a failed run and return exit status 1. A missing
 * `input` file gets its own message; an error about any other path does not.
 */
export const reportFailure = (
  stderr: Writable,
  error: unknown,
  input?: string,
  program?: string
): number => {
  if (input !== undefined && isMissingFile(error) && error.path === input) {
    printError(stderr, `'${input}' does not exist.`, program);
  } else if (error instanceof Error) {
    printError(stderr, error, program);
  } else {
    printError(stderr, String(error), program);
  }
  return 1;
};

/**
 * Log a failed run, unless the logger itself cannot be built
 */
export const logFailure = (error: unknown) => {
  if (error instanceof ConfigError) return;
  cliLogger.debug('Run failed', { error: error instanceof Error ? error.stack : String(error) });
};

export const defaultStreams = (): CliStreams => ({
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
});

/**
 * Run the CLI and resolve to the exit status
 */
export const run = async (
  argv: readonly string[],
  streams: CliStreams = defaultStreams()
): Promise<number> => {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    return reportFailure(streams.stderr, error);
  }

  if (options.help) {
    printHelp(streams.stdout);
    return 0;
  }

  try {
    cliLogger.debug('Arguments parsed', { ...options });

    await htmlDeltags({
      input: options.input ?? streams.stdin,
      output: options.output ?? streams.stdout,
      deleteTags: options.deleteTags,
      keywordRules: options.keywordRules,
      parser: options.parser,
      keywordScope: options.keywordScope,
    });

    return 0;
  } catch (error) {
    logFailure(error);
    return reportFailure(streams.stderr, error, options.input);
  }
};
