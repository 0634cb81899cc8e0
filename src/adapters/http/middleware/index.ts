// src/adapters/http/middleware/index.ts

export { authMiddleware } from './auth';
