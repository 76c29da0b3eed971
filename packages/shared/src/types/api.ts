export interface PaginationMeta {
  total: number;
  limit: number;
  offset: number;
  has_more: boolean;
}

export interface SuccessEnvelope<T, M = Record<string, unknown>> {
  status: 'success';
  timestamp: string;
  data: T;
  meta?: M;
  message?: string;
}

export interface ErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

export interface ErrorEnvelope {
  status: 'error';
  timestamp: string;
  error: ErrorBody;
  request_id?: string;
}

export type ApiEnvelope<T, M = Record<string, unknown>> = SuccessEnvelope<T, M> | ErrorEnvelope;
