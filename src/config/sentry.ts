import * as Sentry from "@sentry/node";
import { env } from "./env.js";
import { logger } from "./logger.js";

/**
 * Inicializa o Sentry para error tracking
 *
 * Configuração:
 * - SENTRY_DSN: URL do projeto Sentry
 * - SENTRY_ENVIRONMENT: production | staging | development
 * - SENTRY_TRACES_SAMPLE_RATE: Taxa de amostragem de traces (0.0 a 1.0)
 */
export function initSentry(): boolean {
  if (!env.SENTRY_DSN) {
    logger.warn("Sentry DSN não configurado. Error tracking desabilitado.");
    return false;
  }

  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
    tracesSampleRate: parseFloat(env.SENTRY_TRACES_SAMPLE_RATE || "0.1"),

    beforeSend(event) {
      if (event.request) {
        delete event.request.cookies;
        if (event.request.headers) {
          delete event.request.headers.authorization;
          delete event.request.headers.cookie;
        }
      }
      return event;
    },
  });

  logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry inicializado");
  return true;
}

export function captureException(error: unknown, context?: Record<string, unknown>) {
  Sentry.captureException(error, {
    extra: context,
  });
}
