import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';

// stdout is reserved for finding lines; every log record goes to stderr.
const STDERR_FD = 2;

function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || 'info';

  // pino-pretty runs in a worker thread, so dev output is asynchronous
  if (isDev) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino({ level }, pino.destination({ dest: STDERR_FD, sync: false }));
}

export const logger = createLogger();

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
