import { ENGINE, ENGINE_LABEL } from './enums';

export class SyncError extends Error {
  constructor(
    public code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SyncError';
  }
}

export class ConnectionError extends SyncError {
  constructor(
    public engine: ENGINE,
    public detail: string,
    options?: { cause?: unknown },
    code: string = 'CONNECTION_FAILED',
  ) {
    super(code, `${ENGINE_LABEL[engine]}: ${detail}`, options);
    this.name = 'ConnectionError';
  }
}

export class QueryError extends ConnectionError {
  constructor(
    engine: ENGINE,
    public table: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(engine, `${table}: ${detail}`, options, 'QUERY_FAILED');
    this.name = 'QueryError';
  }
}

export class NotFoundError extends SyncError {
  constructor(public path: string) {
    super('NOT_FOUND', `Database file not found: ${path}`);
    this.name = 'NotFoundError';
  }
}

export class EmptyDatabaseError extends SyncError {
  constructor(
    public engine: ENGINE,
    location: string,
  ) {
    super('EMPTY_DATABASE', `No tables found in ${ENGINE_LABEL[engine]} database ${location}`);
    this.name = 'EmptyDatabaseError';
  }
}

export class NoUsableDatabaseError extends SyncError {
  constructor(host: string) {
    super('NO_USABLE_DATABASE', `Could not find a usable database on ${host} with the given credentials`);
    this.name = 'NoUsableDatabaseError';
  }
}

export class AuthenticationError extends SyncError {
  constructor(
    message: string = 'Invalid username or password',
    public status?: number,
  ) {
    super('AUTHENTICATION_FAILED', message);
    this.name = 'AuthenticationError';
  }
}

export class TransportError extends SyncError {
  constructor(
    public url: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super('TRANSPORT_FAILED', `Request to ${url} failed: ${detail}`, options);
    this.name = 'TransportError';
  }
}

export class SyncFailure extends SyncError {
  constructor(
    public table: string,
    public endpoint: string,
    detail: string,
    public status?: number,
    options?: { cause?: unknown },
  ) {
    super('SYNC_FAILED', `Sync of ${table} to ${endpoint} failed: ${detail}`, options);
    this.name = 'SyncFailure';
  }
}

export class TransformationError extends SyncError {
  constructor(
    public table: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super('TRANSFORMATION_FAILED', `Could not transform ${table}: ${detail}`, options);
    this.name = 'TransformationError';
  }
}

export class SchemaConfigurationError extends SyncError {
  constructor(
    public table: string,
    detail: string,
  ) {
    super('SCHEMA_CONFIGURATION', `Table ${table} is misconfigured: ${detail}`);
    this.name = 'SchemaConfigurationError';
  }
}

export class ConfigurationError extends SyncError {
  constructor(public issues: Array<{ field: string; message: string }>) {
    super(
      'INVALID_CONFIGURATION',
      `Invalid configuration: ${issues.map(i => `${i.field} ${i.message}`).join('; ')}`,
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Message suitable for showing to the person operating the sync
 */
export function describeError(error: unknown): string {
  if (error instanceof ConnectionError) {
    return `${ENGINE_LABEL[error.engine]} error: ${error.detail}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
