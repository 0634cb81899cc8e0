// src/domain/models/SimulationModel.ts

export interface ISimulationModel {
    name: string;
    description: string;
    createdAt: number;
}

export type NewSimulationModel = Pick<ISimulationModel, 'name'> & Partial<Pick<ISimulationModel, 'description'>>;
