/**
 * Error types
 *
 * Every error raised by this package carries a stable `code` so callers and
 * the CLI can tell them apart without matching on messages. Parser and I/O
 * errors are not wrapped; they reach the caller as thrown.
 */

export type DeltagsErrorCode = 'INVALID_RULE' | 'UNKNOWN_PARSER' | 'USAGE' | 'CONFIG';

export class DeltagsError extends Error {
  readonly code: DeltagsErrorCode;

  constructor(code: DeltagsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A keyword rule was given without a tag name
 */
export class InvalidRuleError extends DeltagsError {
  readonly spec: string;

  constructor(spec: string, message = `invalid keyword rule '${spec}': tag name is empty`) {
    super('INVALID_RULE', message);
    this.spec = spec;
  }
}

export class UnknownParserError extends DeltagsError {
  readonly parser: string;

  constructor(parser: string, known: readonly string[]) {
    super('UNKNOWN_PARSER', `unknown parser '${parser}' (expected one of: ${known.join(', ')})`);
    this.parser = parser;
  }
}

/**
 * Malformed command line
 */
export class UsageError extends DeltagsError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

/**
 * The environment holds a value the configuration schema rejects
 */
export class ConfigError extends DeltagsError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('CONFIG', `Invalid configuration:\n${issues.join('\n')}`);
    this.issues = issues;
  }
}
