import { ZodError } from "zod";
import { logger } from "../config/logger.js";
import { captureException } from "../config/sentry.js";
import { AppError } from "./AppError.js";
import { ProcessorError } from "./ProcessorError.js";
import { SubscriptionError } from "./SubscriptionError.js";

export interface ErrorResponseBody {
  status: "error";
  message: string;
  kind?: string;
  code?: string;
  details?: unknown;
}

export interface ErrorResponse {
  statusCode: number;
  body: ErrorResponseBody;
}

/**
 * Converte qualquer erro do núcleo de assinaturas numa resposta para a
 * superfície que hospeda este serviço (HTTP, fila, etc).
 */
export function toErrorResponse(error: unknown, context: Record<string, unknown> = {}): ErrorResponse {
  // 1. Erro conhecido (classificado pelo orquestrador)
  if (error instanceof AppError && error.isOperational) {
    logger.warn({ ...context, error: error.message, statusCode: error.statusCode }, "Erro Operacional");
    return {
      statusCode: error.statusCode,
      body: {
        status: "error",
        message: error.message,
        ...(error instanceof SubscriptionError && { kind: error.kind }),
      },
    };
  }

  // 2. Erro de validação (Zod)
  if (error instanceof ZodError) {
    logger.warn({ ...context, details: error.issues }, "Erro de Validação (Zod)");
    return {
      statusCode: 400,
      body: {
        status: "error",
        message: "Dados de entrada inválidos.",
        details: error.issues,
      },
    };
  }

  captureException(error, context);

  // 3. Erro do processador não classificado: repassa o código do provedor
  if (error instanceof ProcessorError) {
    logger.error(
      { ...context, provider: error.provider, code: error.code, httpStatus: error.httpStatus, error: error.message },
      "Erro do processador de pagamento"
    );
    return {
      statusCode: error.httpStatus !== undefined && error.httpStatus >= 400 && error.httpStatus < 500 ? 400 : 502,
      body: {
        status: "error",
        message: "Falha no processador de pagamento.",
        code: error.code,
      },
    };
  }

  // 4. Erro desconhecido (bug / infra)
  logger.error(
    {
      ...context,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    },
    "Erro Interno (500)"
  );

  return {
    statusCode: 500,
    body: {
      status: "error",
      message: "Ocorreu um erro interno no servidor.",
    },
  };
}
