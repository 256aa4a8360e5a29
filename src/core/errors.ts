/**
 * Fatal analysis errors. Each aborts the run before any output is written.
 */

export class ChangeGuardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChangeGuardError';
  }
}

/** Document is missing its version, is malformed, or repeats a key */
export class InvalidSpecError extends ChangeGuardError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`${source}: ${detail}`);
    this.name = 'InvalidSpecError';
    this.source = source;
  }
}

export class InvalidVersionError extends ChangeGuardError {
  readonly version: string;

  constructor(version: string, source?: string) {
    super(`${source ? `${source}: ` : ''}Invalid semver version: "${version}"`);
    this.name = 'InvalidVersionError';
    this.version = version;
  }
}

/** Usage-log file was supplied but could not be read as records */
export class LogParseError extends ChangeGuardError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`${source}: ${detail}`);
    this.name = 'LogParseError';
    this.source = source;
  }
}
