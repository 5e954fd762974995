export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
  /** Work item the entry refers to, when there is one */
  itemId?: string;
}

export type LogTransport = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: unknown, itemId?: string): void;
  info(message: string, data?: unknown, itemId?: string): void;
  warn(message: string, data?: unknown, itemId?: string): void;
  error(message: string, data?: unknown, itemId?: string): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalTransports: LogTransport[] = [];
let globalMinLevel: LogLevel = 'info';

/** Add a transport that receives all log entries */
export function addLogTransport(transport: LogTransport): () => void {
  globalTransports.push(transport);
  return () => {
    globalTransports = globalTransports.filter((t) => t !== transport);
  };
}

/** Set the minimum log level (entries below this are dropped) */
export function setLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/** Default transport: info and debug to stdout, warnings and errors to stderr */
export function consoleTransport(entry: LogEntry): void {
  const prefix = entry.itemId ? `[${entry.scope}] (${entry.itemId})` : `[${entry.scope}]`;
  const msg = entry.data !== undefined
    ? `${prefix} ${entry.message} ${JSON.stringify(entry.data)}`
    : `${prefix} ${entry.message}`;

  switch (entry.level) {
    case 'debug':
    case 'info':
      process.stdout.write(`${msg}\n`);
      break;
    case 'warn':
      process.stderr.write(`WARN ${msg}\n`);
      break;
    case 'error':
      process.stderr.write(`ERROR ${msg}\n`);
      break;
  }
}

/** Redact API keys and tokens from log messages */
export function redactSecrets(message: string): string {
  return message.replace(
    /\b((?:sk|gsk|AIza)[-_]?[a-zA-Z0-9_-]{6})[a-zA-Z0-9_-]{20,}/g,
    '$1****',
  );
}

function emit(entry: LogEntry): void {
  if (LOG_LEVELS[entry.level] < LOG_LEVELS[globalMinLevel]) return;
  const sanitized = { ...entry, message: redactSecrets(entry.message) };
  for (const transport of globalTransports) {
    try {
      transport(sanitized);
    } catch {
      // Don't let transport errors break the caller
    }
  }
}

/**
 * Create a scoped logger. Each package/module creates one:
 *   const log = createLogger('RevisionMachine');
 *   log.info('Stage finished', { stage: 'validate' }, itemId);
 */
export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, data?: unknown, itemId?: string): void {
    emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
      itemId,
    });
  }

  return {
    debug: (message, data, itemId) => log('debug', message, data, itemId),
    info: (message, data, itemId) => log('info', message, data, itemId),
    warn: (message, data, itemId) => log('warn', message, data, itemId),
    error: (message, data, itemId) => log('error', message, data, itemId),
  };
}

// Register console transport by default
addLogTransport(consoleTransport);
