import pino from 'pino';

const level = process.env.LOG_LEVEL ?? 'info';
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

// Operator-facing text owns stdout, so structured logs always go to stderr.
export const logger = pretty
  ? pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          destination: 2,
        },
      },
    })
  : pino({ level }, pino.destination(2));
