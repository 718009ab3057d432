/**
 * Torrent Forge error taxonomy
 */

export class EncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

export class DecodingError extends Error {
  /** Byte offset where decoding stopped */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'DecodingError';
    this.offset = offset;
  }
}

export class HashMismatchError extends Error {
  readonly target: string;
  readonly attempts: number;

  constructor(target: string, attempts: number) {
    super(`No info variant hashed to ${target} within ${attempts} attempts`);
    this.name = 'HashMismatchError';
    this.target = target;
    this.attempts = attempts;
  }
}

export class ResolverUnavailableError extends Error {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(`${service} unavailable: ${message}`, options);
    this.name = 'ResolverUnavailableError';
    this.service = service;
  }
}

export class SearcherUnavailableError extends Error {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(`${service} unavailable: ${message}`, options);
    this.name = 'SearcherUnavailableError';
    this.service = service;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}
