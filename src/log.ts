export type LogLevel = 'info' | 'warn' | 'error';

type LogPayload = Record<string, unknown>;

const baseFields = {
  service: 'daycareFinder'
} as const;

function log(level: LogLevel, message: string, payload?: LogPayload): void {
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...baseFields,
    ...payload
  };
  const line = `${JSON.stringify(entry)}\n`;
  if (level === 'error') {
    process.stderr.write(line);
    return;
  }
  process.stdout.write(line);
}

export const logger = {
  info(message: string, payload?: LogPayload): void {
    log('info', message, payload);
  },
  warn(message: string, payload?: LogPayload): void {
    log('warn', message, payload);
  },
  error(message: string, payload?: LogPayload): void {
    log('error', message, payload);
  }
};

export type Logger = typeof logger;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
