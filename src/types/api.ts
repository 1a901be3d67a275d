/**
 * API response types
 */

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

export interface QueryMeta {
  executionTimeMs: number;
  appliedFilters: Record<string, unknown>;
}

export interface ListResponse<T> {
  data: T[];
  meta?: {
    total?: number;
    query?: QueryMeta;
  };
}
