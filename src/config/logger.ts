import pino from "pino";
import { env } from "./env.js";

// Usar pino-pretty em desenvolvimento para logs formatados
const isDevelopment = env.NODE_ENV === "development";
const isProduction = env.NODE_ENV === "production";
const isTest = env.NODE_ENV === "test";

// Credenciais do assinante, requisições cegas e o vínculo com a conta de
// pagamento nunca vão para os logs
export const logRedaction = {
  paths: [
    "authTag",
    "hmac",
    "password",
    "subscriberUser",
    "subscriberId",
    "customerId",
    "receiptCredentialRequest",
    "authorization",
    "headers.authorization",
    "*.authTag",
    "*.hmac",
    "*.password",
    "*.subscriberUser",
    "*.subscriberId",
    "*.customerId",
    "*.receiptCredentialRequest",
  ],
  remove: true,
} satisfies pino.LoggerOptions["redact"];

const baseConfig: pino.LoggerOptions = {
  level: isTest ? "silent" : env.LOG_LEVEL,
  redact: logRedaction,

  ...(isProduction && {
    formatters: {
      level: (label: string) => {
        return { level: label.toUpperCase() };
      },
    },
  }),
};

function getLoggerConfig(): pino.LoggerOptions {
  if (isProduction && env.LOGTAIL_TOKEN) {
    // PRODUÇÃO: console + Better Stack
    return {
      ...baseConfig,
      transport: {
        targets: [
          {
            target: "pino-pretty",
            level: env.LOG_LEVEL,
            options: {
              colorize: false,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
          {
            target: "@logtail/pino",
            level: env.LOG_LEVEL,
            options: {
              sourceToken: env.LOGTAIL_TOKEN,
            },
          },
        ],
      },
    };
  }

  if (isDevelopment) {
    return {
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
      },
    };
  }

  // FALLBACK: JSON puro
  return baseConfig;
}

const logger = pino(getLoggerConfig());

export { logger };
