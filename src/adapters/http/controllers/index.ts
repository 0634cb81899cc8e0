// src/adapters/http/controllers/index.ts

export { default as ControllerRoot } from './controllerRoot';
export { HealthController } from './HealthController';
export type { HealthStatus } from './HealthController';
export { RecordsController } from './RecordsController';
export { ReportsController } from './ReportsController';
export { ModelsController } from './ModelsController';
