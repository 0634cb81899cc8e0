// src/adapters/database/schema.ts

// Tabelas de registros de simulação e do cadastro de modelos.
// SQLite local e Turso (ambos via libSQL) compartilham o mesmo DDL.
// Postgres: contagens em BIGINT (qualquer inteiro seguro é aceito).

export const SQLITE_SCHEMA: readonly string[] = [
    `CREATE TABLE IF NOT EXISTS simulation_records (
        id TEXT PRIMARY KEY,
        model_name TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        planned_time REAL NOT NULL,
        downtime REAL NOT NULL,
        actual_cycle_time REAL NOT NULL,
        ideal_cycle_time REAL NOT NULL,
        total_simulations INTEGER NOT NULL,
        failed_simulations INTEGER NOT NULL,
        availability REAL NOT NULL,
        performance REAL NOT NULL,
        quality REAL NOT NULL,
        oee REAL NOT NULL,
        notes TEXT NOT NULL DEFAULT ''
    )`,
    `CREATE TABLE IF NOT EXISTS simulation_models (
        name TEXT PRIMARY KEY,
        description TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS idx_simulation_records_timestamp ON simulation_records(timestamp)`,
    `CREATE INDEX IF NOT EXISTS idx_simulation_records_model ON simulation_records(model_name, timestamp)`
];

export const POSTGRES_SCHEMA: readonly string[] = [
    `CREATE TABLE IF NOT EXISTS simulation_records (
        id TEXT PRIMARY KEY,
        model_name TEXT NOT NULL,
        timestamp BIGINT NOT NULL,
        planned_time DOUBLE PRECISION NOT NULL,
        downtime DOUBLE PRECISION NOT NULL,
        actual_cycle_time DOUBLE PRECISION NOT NULL,
        ideal_cycle_time DOUBLE PRECISION NOT NULL,
        total_simulations BIGINT NOT NULL,
        failed_simulations BIGINT NOT NULL,
        availability DOUBLE PRECISION NOT NULL,
        performance DOUBLE PRECISION NOT NULL,
        quality DOUBLE PRECISION NOT NULL,
        oee DOUBLE PRECISION NOT NULL,
        notes TEXT NOT NULL DEFAULT ''
    )`,
    `CREATE TABLE IF NOT EXISTS simulation_models (
        name TEXT PRIMARY KEY,
        description TEXT NOT NULL DEFAULT '',
        created_at BIGINT NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS idx_simulation_records_timestamp ON simulation_records(timestamp)`,
    `CREATE INDEX IF NOT EXISTS idx_simulation_records_model ON simulation_records(model_name, timestamp)`
];
