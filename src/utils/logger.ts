export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel | 'SILENT', number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40, SILENT: 100 };

const isLevelName = (value: string): value is LogLevel | 'SILENT' => Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);

const resolveThreshold = (raw?: string): number => {
  const key = (raw || 'INFO').toUpperCase();
  return isLevelName(key) ? LEVEL_RANK[key] : LEVEL_RANK.INFO;
};

let threshold = resolveThreshold(process.env.LOG_LEVEL);

export const setLogLevel = (level: LogLevel | 'SILENT'): void => {
  threshold = LEVEL_RANK[level];
};

export const log = (level: LogLevel, msg: string, meta?: unknown): void => {
  if (LEVEL_RANK[level] < threshold) return;
  const stamp = new Date().toISOString();
  const write = level === 'ERROR' ? console.error : console.log;
  if (meta !== undefined) {
    write(`[${stamp}] [${level}] ${msg}`, meta);
  } else {
    write(`[${stamp}] [${level}] ${msg}`);
  }
};

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
