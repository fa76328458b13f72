import pino from 'pino';

export const log = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'pbx-call-monitor' },
  redact: {
    paths: ['secret', 'config.secret', '*.secret', 'fields.Secret'],
    censor: '[redacted]',
  },
});
