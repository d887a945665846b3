export type IngestionStatus = 'processed' | 'failed';

export interface IngestionEvent {
  timestamp: Date;
  filename: string;
  status: IngestionStatus;
  message?: string;
}

export interface EventLogPort {
  ensureExists(): Promise<void>;
  append(event: IngestionEvent): Promise<void>;
}
