/**
 * Error hierarchy for extconf.
 *
 * Resource errors are never thrown by the loader; they are built and logged
 * so a missing or broken configuration source cannot stop startup.
 */

export interface ErrorOptions {
  cause?: Error;
}

export class ExtconfError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ExtconfError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    return obj;
  }
}

export class ResourceNotFoundError extends ExtconfError {
  constructor(name: string, options?: ErrorOptions) {
    super('RESOURCE_NOT_FOUND', `No ${name} found on the search path`, { name }, options?.cause);
    this.name = 'ResourceNotFoundError';
  }
}

export class AmbiguousResourceError extends ExtconfError {
  constructor(name: string, locations: readonly string[], options?: ErrorOptions) {
    super(
      'AMBIGUOUS_RESOURCE',
      `Only 1 ${name} file is expected, but ${locations.length} were found on the search path: ${locations.join(', ')}`,
      { name, locations: [...locations] },
      options?.cause,
    );
    this.name = 'AmbiguousResourceError';
  }

  get locations(): string[] {
    const value = this.details['locations'];
    return Array.isArray(value) ? value.map(String) : [];
  }
}

export class ReadFailureError extends ExtconfError {
  constructor(name: string, location: string, options?: ErrorOptions) {
    super(
      'READ_FAILURE',
      `Failed to load ${name} from ${location} (ignoring this source)${options?.cause ? `: ${options.cause.message}` : ''}`,
      { name, location },
      options?.cause,
    );
    this.name = 'ReadFailureError';
  }
}

export class ConfigError extends ExtconfError {
  constructor(message: string, options?: ErrorOptions & { errors?: Array<Record<string, unknown>> }) {
    super('CONFIG_INVALID', message, options?.errors ? { errors: options.errors } : {}, options?.cause);
    this.name = 'ConfigError';
  }
}

export class UnknownExtensionPointError extends ExtconfError {
  constructor(pointName: string, available: readonly string[], options?: ErrorOptions) {
    super(
      'UNKNOWN_EXTENSION_POINT',
      `Unknown extension point: '${pointName}'. Available: ${[...available].sort().join(', ')}`,
      { pointName },
      options?.cause,
    );
    this.name = 'UnknownExtensionPointError';
  }
}

export class InvalidExtensionError extends ExtconfError {
  constructor(pointName: string, extensionName: string, typeName: string, options?: ErrorOptions) {
    super(
      'INVALID_EXTENSION',
      `Extension '${extensionName}' for '${pointName}' must satisfy the ${typeName} interface`,
      { pointName, extensionName },
      options?.cause,
    );
    this.name = 'InvalidExtensionError';
  }
}

/** Normalize any thrown value into an Error for use as a `cause`. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
