import * as Sentry from "@sentry/node";
import { env } from "./env.js";
import { logger } from "./logger.js";

/**
 * Inicializa o Sentry para error tracking.
 *
 * - SENTRY_DSN: URL do projeto Sentry
 * - SENTRY_ENVIRONMENT: production | staging | development
 * - SENTRY_TRACES_SAMPLE_RATE: taxa de amostragem de traces (0.0 a 1.0)
 */
export function initSentry(): boolean {
  if (!env.SENTRY_DSN) {
    logger.warn("Sentry DSN não configurado. Error tracking desabilitado.");
    return false;
  }

  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
    tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,

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

    // Erros de cliente já classificados não são bugs
    ignoreErrors: ["ZodError", "SubscriptionError"],
  });

  logger.info(
    { environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV, tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE },
    "Sentry inicializado"
  );
  return true;
}

/**
 * Captura exceção manualmente
 */
export function captureException(error: unknown, context?: Record<string, unknown>) {
  Sentry.captureException(error, {
    extra: context,
  });
}
