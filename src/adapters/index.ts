export * from './sqlite-connector';
export * from './sqlserver-connector';
export * from './mysql-connector';
export * from './postgres-connector';
export * from './memory-connector';
export * from './http-api-client';
