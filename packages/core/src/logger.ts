import pino, { type Logger } from 'pino';

// stdout belongs to the MCP stdio transport, so logs go to stderr.
export const logger: Logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label: string) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination(2)
);

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
