import type { PageResult } from "./types";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * The endpoint answered but reported errors in the payload. `partial` holds the
 * page when the response still carried a usable search connection.
 */
export class SourceError extends Error {
  constructor(
    message: string,
    public readonly partial: PageResult | null = null,
    public readonly rateLimited = false
  ) {
    super(message);
    this.name = "SourceError";
    Object.setPrototypeOf(this, SourceError.prototype);
  }
}

export class EmptyPageError extends Error {
  constructor(message = "Source returned an empty page") {
    super(message);
    this.name = "EmptyPageError";
    Object.setPrototypeOf(this, EmptyPageError.prototype);
  }
}

export class RecordDerivationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = "RecordDerivationError";
    Object.setPrototypeOf(this, RecordDerivationError.prototype);
  }
}

export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly causes: Error[] = []
  ) {
    super(message);
    this.name = "PersistenceError";
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

export class BaselineFormatError extends Error {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(message);
    this.name = "BaselineFormatError";
    Object.setPrototypeOf(this, BaselineFormatError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
