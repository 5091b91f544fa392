export type RunLogLevel = 'info' | 'warn' | 'error';

export type RunLogEntry = {
  at: string;
  level: RunLogLevel;
  message: string;
};

export type RunLogger = {
  entries: RunLogEntry[];
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export function createRunLogger(options: { echo?: boolean } = {}): RunLogger {
  const echo = options.echo ?? true;
  const entries: RunLogEntry[] = [];

  const push = (level: RunLogLevel, message: string) => {
    entries.push({ at: new Date().toISOString(), level, message });
    if (!echo) {
      return;
    }
    if (level === 'error') {
      console.error(`[cwv:${level}] ${message}`);
      return;
    }
    if (level === 'warn') {
      console.warn(`[cwv:${level}] ${message}`);
      return;
    }
    console.log(`[cwv:${level}] ${message}`);
  };

  return {
    entries,
    info: (message) => push('info', message),
    warn: (message) => push('warn', message),
    error: (message) => push('error', message),
  };
}
