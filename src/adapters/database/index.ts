// src/adapters/database/index.ts

export type { IDatabase, QueryResult, DatabaseProvider } from './IDatabase';
export { loadDatabaseConfig } from './DatabaseConfig';
export type { IDatabaseConfig, DatabaseType } from './DatabaseConfig';
export { createDatabase, openDatabase } from './DatabaseFactory';
export * from './repositories';
