export interface SyncError {
  message_id: string;
  error: string;
}

export interface SyncResult {
  query: string;
  total_emails: number;
  saved: number;
  skipped: number;
  failed: number;
  errors: SyncError[];
}

export type SyncMeta = Pick<SyncResult, 'total_emails' | 'saved' | 'skipped' | 'failed'>;

export interface SyncFilters {
  name?: string;
  email?: string;
  company?: string;
}
