import pino from 'pino';

export const logger = pino({
  name: 'token-bucket',
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label) {
      return { level: label };
    },
  },
});
