// Structured event log: one JSON object per line
import fs from 'node:fs';
import path from 'node:path';
import { LOG_FILE_NAME } from './constants.market.js';

export type EventSink = (event: Record<string, unknown>) => void;

export function eventLogPath(logDir: string): string {
  return path.join(logDir, LOG_FILE_NAME);
}

export function createEventLog(logDir: string): EventSink {
  const file = eventLogPath(logDir);

  return function logEvent(data: Record<string, unknown>) {
    try {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      const line = JSON.stringify({ ts: new Date().toISOString(), ...data }) + '\n';

      fs.appendFile(file, line, err => {
        if (err) {
          console.error('[LOGGER ERROR]', err);
        }
      });
    } catch (e) {
      console.error('[LOGGER FATAL]', e);
    }
  };
}

export const noopEventSink: EventSink = () => {};
