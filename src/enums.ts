/**
 * Enumeration for the supported storage engines
 */
export enum ENGINE {
  SQLITE = 'sqlite',
  SQL_SERVER = 'sqlserver',
  MYSQL = 'mysql',
  POSTGRES = 'postgres',
}

/**
 * Human readable engine names, used in error messages
 */
export const ENGINE_LABEL: Record<ENGINE, string> = {
  [ENGINE.SQLITE]: 'SQLite',
  [ENGINE.SQL_SERVER]: 'SQL Server',
  [ENGINE.MYSQL]: 'MySQL',
  [ENGINE.POSTGRES]: 'PostgreSQL',
};

/**
 * Enumeration for sync event types
 */
export enum SYNC_EVENT {
  // Run events
  RUN_STARTED = 'run:started',
  RUN_COMPLETED = 'run:completed',
  RUN_FAILED = 'run:failed',
  RUN_SKIPPED = 'run:skipped',

  // Table events
  TABLE_SYNCED = 'table:synced',
  TABLE_SKIPPED = 'table:skipped',

  // Session events
  SESSION_STATE_CHANGED = 'session:state-changed',
}

/**
 * Enumeration for session states
 */
export enum SESSION_STATE {
  NO_SESSION = 'NO_SESSION',
  AWAITING_CREDENTIALS = 'AWAITING_CREDENTIALS',
  AUTHENTICATED = 'AUTHENTICATED',
  EXPIRED = 'EXPIRED',
}

/**
 * Enumeration for the outcome of a sync run
 */
export enum RUN_STATUS {
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
  SKIPPED = 'SKIPPED',
}

/**
 * What started a sync run
 */
export enum RUN_TRIGGER {
  MANUAL = 'manual',
  TIMER = 'timer',
}

/**
 * Why a table was left out of a run
 */
export enum SKIP_REASON {
  NO_COLUMNS = 'no-columns',
  NO_PENDING_ROWS = 'no-pending-rows',
  TRANSFORMATION_ERROR = 'transformation-error',
}

/**
 * Remote entity kinds that can be fetched for display
 */
export enum ENTITY {
  PRODUCT = 'producto',
  CLIENT = 'cliente',
  SALE = 'venta',
  SALE_DETAIL = 'detalle_venta',
}
