export interface Logger {
  info(m: string): void;
  warn(m: string): void;
  error(m: string): void;
}

export function createConsoleLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (m) => console.log(`${prefix} ${m}`),
    warn: (m) => console.warn(`${prefix} ${m}`),
    error: (m) => console.error(`${prefix} ${m}`),
  };
}

export function scopedLogger(log: Logger, scope: string): Logger {
  return {
    info: (m) => log.info(`[${scope}] ${m}`),
    warn: (m) => log.warn(`[${scope}] ${m}`),
    error: (m) => log.error(`[${scope}] ${m}`),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
