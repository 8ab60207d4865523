export const parseInteger = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
};

const optional = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : null;
};

export const getAppConfig = () => ({
  env: process.env.NODE_ENV || 'development',
  port: parseInteger(process.env.PORT, 3000),
  apiKey: optional(process.env.API_KEY),
  rateLimit: {
    windowMs: parseInteger(process.env.RATE_LIMIT_WINDOW_MS, 60_000),
    max: parseInteger(process.env.RATE_LIMIT_MAX, 120),
  },
  requestIdHeader: (process.env.REQUEST_ID_HEADER || 'x-request-id').toLowerCase(),
  logging: {
    redactHeaders: ['authorization', 'cookie', 'x-api-key'],
  },
  // Responses are JSON or plain text; nothing loads sub-resources.
  helmet: {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
  },
});

export type AppConfig = ReturnType<typeof getAppConfig>;
