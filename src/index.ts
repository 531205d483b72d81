/**
 * Retail Sync - moves retail records from a local database to a REST API
 *
 * @example
 * ```typescript
 * import { ConnectionResolver, HttpApiClient, SyncEngine, loadConfig } from 'retail-sync';
 *
 * const config = loadConfig();
 * const connector = await new ConnectionResolver().resolve({
 *   host: './store.sqlite',
 *   database: '',
 *   user: '',
 *   password: '',
 *   integratedSecurity: false,
 * });
 *
 * const engine = new SyncEngine({
 *   connector,
 *   api: new HttpApiClient({ baseUrl: config.apiBaseUrl }),
 *   credentialProvider: { requestCredentials: async () => ({ username: 'clerk', password: 'test-secret' }) },
 * });
 *
 * engine.on('table:synced', ({ table, rowCount }) => {
 *   console.log(`${table}: ${rowCount} rows sent`);
 * });
 *
 * await engine.sync(['producto', 'venta']);
 * ```
 */

// Core types and interfaces
export type * from './types';
export type * from './interfaces';

// Enums and errors
export * from './enums';
export * from './errors';

// Logging and configuration
export * from './logger';
export * from './config';

// Utilities and table catalogue
export * from './utils';
export * from './tables';

// Event system
export * from './event-emitter';

// Connection handling
export * from './resolver';
export * from './validation';
export * from './inspect';

// Sync pipeline
export * from './transformer';
export * from './session';
export * from './models';
export * from './sync-engine';

// Adapters
export * from './adapters';
