import { appendFileSync } from 'fs';

let logFile: string | undefined = process.env.LOG_FILE || undefined;

/** Send log lines to a file instead of stderr (keeps the dashboard clean). */
export function setLogFile(path: string | undefined): void {
  logFile = path || undefined;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
}

export function log(message: string): void {
  const line = `[${formatTimestamp(new Date())}] ${message}`;
  if (logFile) {
    appendFileSync(logFile, `${line}\n`);
  } else {
    console.error(line);
  }
}
