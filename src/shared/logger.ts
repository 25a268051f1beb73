import pino from 'pino';

const env = process.env['NODE_ENV'];
const pretty = env !== 'production' && env !== 'test' && process.stderr.isTTY === true;

const options: pino.LoggerOptions = {
  level: process.env['LOG_LEVEL'] ?? 'info',
  redact: {
    paths: ['password', 'token', 'authorization', '*.password', '*.authorization'],
    censor: '***REDACTED***',
  },
};

// Command output owns stdout, so log lines always go to stderr.
export const logger = pretty
  ? pino({
      ...options,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    })
  : pino(options, pino.destination(2));
