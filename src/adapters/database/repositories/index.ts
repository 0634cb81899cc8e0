// src/adapters/database/repositories/index.ts

export { BaseRepository } from './BaseRepository';
export { SimulationRecordRepository } from './SimulationRecordRepository';
export { SimulationModelRepository } from './SimulationModelRepository';
