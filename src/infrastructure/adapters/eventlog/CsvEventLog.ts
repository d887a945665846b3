import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import dayjs from 'dayjs';
import { EventLogPort, IngestionEvent } from '../../../application/ports/EventLogPort.js';

const needsQuoting = /[",]/;

export const formatLogField = (value: string): string => {
  const singleLine = value.replace(/\r\n|\r|\n/g, ' ');
  return needsQuoting.test(singleLine) ? `"${singleLine.replace(/"/g, '""')}"` : singleLine;
};

export const formatLogLine = (event: IngestionEvent): string =>
  [
    dayjs(event.timestamp).format('YYYY-MM-DD HH:mm:ss.SSS'),
    formatLogField(event.filename),
    event.status,
    formatLogField(event.message ?? ''),
  ].join(',');

/** Append-only `timestamp,filename,status,message` log; lines are never rewritten. */
export class CsvEventLog implements EventLogPort {
  constructor(private readonly logFile: string) {}

  async ensureExists(): Promise<void> {
    await mkdir(path.dirname(this.logFile), { recursive: true });
    await writeFile(this.logFile, '', { flag: 'a' });
  }

  async append(event: IngestionEvent): Promise<void> {
    await appendFile(this.logFile, `${formatLogLine(event)}\n`, 'utf8');
  }
}
