import pino from 'pino';

/**
 * Logger factory - creates structured logger instances.
 * Writes to stderr; stdout belongs to the chat dialogue.
 */
export function createLogger(serviceName: string) {
  return pino(
    {
      name: serviceName,
      level: process.env.LOG_LEVEL || 'info',
      formatters: {
        level: (label) => {
          return { level: label };
        }
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination(2)
  );
}

export type Logger = ReturnType<typeof createLogger>;
