import pino from 'pino';

// stdout carries protocol frames only, so every log line goes to stderr.
export const logger = pino(
  {
    name: 'daisyui-docs-mcp',
    level: process.env['LOG_LEVEL'] ?? 'info',
  },
  pino.destination(2)
);
