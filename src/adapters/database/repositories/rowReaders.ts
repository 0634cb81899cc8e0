// src/adapters/database/repositories/rowReaders.ts

import { DbRow } from '../IDatabase';
import { StorageError } from '../../../domain/errors';

// Postgres devolve BIGINT como string; libSQL pode devolver bigint
export function readNumber(row: DbRow, column: string): number {
    const value = row[column];
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
        return Number(value);
    }
    throw new StorageError(`Unexpected value in column ${column}`);
}

export function readString(row: DbRow, column: string): string {
    const value = row[column];
    if (typeof value === 'string') return value;
    if (value === null || value === undefined) return '';
    throw new StorageError(`Unexpected value in column ${column}`);
}
