// Scoped console logger. Debug output is only emitted when DEBUG=1|true.

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const dbg = (env.DEBUG || '').toLowerCase();
  return dbg === '1' || dbg === 'true';
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const emit = (method: 'info' | 'warn' | 'error', message: string, data?: Record<string, unknown>) => {
    if (data && Object.keys(data).length > 0) console[method](`${prefix} ${message}`, data);
    else console[method](`${prefix} ${message}`);
  };
  return {
    debug(event, data = {}) {
      if (isDebugEnabled()) console.debug(`[${scope}:${event}]`, JSON.stringify(data));
    },
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}
