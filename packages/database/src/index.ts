// Database connection
export { createDatabase, sql, type Database, type DatabaseConnection, type ConnectionOptions } from './db.js';

// Schema exports
export * from './schema/index.js';

// Repository exports
export * from './repositories/index.js';
