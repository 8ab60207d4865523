import pino from 'pino';

export const logger = pino({
  name: 'bluelink-kr',
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: [
      'accessToken',
      'refreshToken',
      'clientSecret',
      '*.accessToken',
      '*.refreshToken',
      '*.clientSecret',
    ],
    censor: '[redacted]',
  },
});

export type Logger = pino.Logger;
