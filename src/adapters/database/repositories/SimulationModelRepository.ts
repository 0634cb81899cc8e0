// src/adapters/database/repositories/SimulationModelRepository.ts

import { BaseRepository } from './BaseRepository';
import { readNumber, readString } from './rowReaders';
import { DbRow } from '../IDatabase';
import { ISimulationModel, NewSimulationModel } from '../../../domain/models/SimulationModel';
import { InvalidInputError } from '../../../domain/errors';

// Cadastro dos modelos (processos) acompanhados; remover um modelo não apaga seus registros
export class SimulationModelRepository extends BaseRepository<ISimulationModel> {
    protected tableName = 'simulation_models';
    protected idColumn = 'name';
    protected timestampColumn = 'created_at';

    protected fromRow(row: DbRow): ISimulationModel {
        return {
            name: readString(row, 'name'),
            description: readString(row, 'description'),
            createdAt: readNumber(row, 'created_at')
        };
    }

    public async list(): Promise<ISimulationModel[]> {
        return this.run('list models', db => this.select(db, `SELECT * FROM ${this.tableName} ORDER BY name ASC`));
    }

    public async findByName(name: string): Promise<ISimulationModel | null> {
        return this.findById(name);
    }

    public async create(entity: NewSimulationModel, now: number = Date.now()): Promise<ISimulationModel> {
        const name = entity.name.trim();
        if (name.length === 0) {
            throw new InvalidInputError('model name must not be empty', 'name');
        }

        const model: ISimulationModel = {
            name,
            description: entity.description ?? '',
            createdAt: now
        };

        const inserted = await this.run('create model', async db => {
            const sql = `INSERT INTO ${this.tableName} (name, description, created_at) VALUES ($1, $2, $3) ON CONFLICT (name) DO NOTHING`;
            return db.execute(this.convertPlaceholders(db, sql), [model.name, model.description, model.createdAt]);
        });

        // Nome já cadastrado (inclusive por uma chamada concorrente)
        if (inserted === 0) {
            throw new InvalidInputError(`model already exists: ${name}`, 'name');
        }
        return model;
    }

    public async delete(name: string): Promise<boolean> {
        return this.run('delete model', async db => {
            const sql = `DELETE FROM ${this.tableName} WHERE ${this.idColumn} = $1`;
            const changes = await db.execute(this.convertPlaceholders(db, sql), [name]);
            return changes > 0;
        });
    }
}
