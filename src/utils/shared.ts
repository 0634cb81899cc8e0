// ============================================
// TIPOS COMPARTILHADOS (paginação de registros)
// ============================================

export interface PaginationParams {
  page: number;   // 1-based
  limit: number;
}

export interface PaginatedResult<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
}
