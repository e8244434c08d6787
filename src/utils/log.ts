type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveThreshold(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return process.env.DEBUG ? 'debug' : 'info';
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const serialized: Record<string, unknown> = { name: value.name, message: value.message };
    if ('context' in value && value.context !== undefined) {
      serialized.context = value.context;
    }
    if (resolveThreshold() === 'debug' && value.stack) {
      serialized.stack = value.stack;
    }
    return serialized;
  }
  return value;
}

function formatContext(context: unknown): string {
  if (context === undefined) return '';
  try {
    return ` ${JSON.stringify(serializeValue(context), (_key, value: unknown) => serializeValue(value))}`;
  } catch {
    return ` ${String(context)}`;
  }
}

function write(level: LogLevel, message: string, context?: unknown) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveThreshold()]) return;

  const line = `[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} ${message}${formatContext(context)}`;
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

export const log = {
  debug: (message: string, context?: unknown) => write('debug', message, context),
  info: (message: string, context?: unknown) => write('info', message, context),
  warn: (message: string, context?: unknown) => write('warn', message, context),
  error: (message: string, context?: unknown) => write('error', message, context)
};
