import pino from "pino";
import { env } from "./env.js";

const isDevelopment = env.NODE_ENV === "development";
const isProduction = env.NODE_ENV === "production";

// Configuração base do logger
const baseConfig: pino.LoggerOptions = {
  level: env.LOG_LEVEL || "info",

  // Telefones e tokens dos webhooks não vão para o log
  redact: {
    paths: [
      "authorization",
      "Authorization",
      "headers.authorization",
      "token",
      "customerPhone",
      "phone",
      "*.token",
      "*.phone",
      "*.customerPhone",
      "body.customer.phone",
      "body.client.phone",
    ],
    remove: true,
  },

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
            level: env.LOG_LEVEL || "info",
            options: {
              colorize: false,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
          {
            target: "@logtail/pino",
            level: env.LOG_LEVEL || "info",
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

  // FALLBACK: JSON puro (test, staging sem token)
  return baseConfig;
}

const logger = pino(getLoggerConfig());

export { logger };
