import { AppError } from "./AppError.js";

export type SubscriptionErrorKind =
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "INVALID_ARGUMENTS"
  | "INVALID_LEVEL"
  | "PROCESSOR_CONFLICT"
  | "PAYMENT_REQUIRES_ACTION"
  | "RECEIPT_ALREADY_REDEEMED"
  | "INTERNAL";

const STATUS_BY_KIND: Record<SubscriptionErrorKind, number> = {
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  INVALID_ARGUMENTS: 400,
  INVALID_LEVEL: 400,
  PROCESSOR_CONFLICT: 409,
  PAYMENT_REQUIRES_ACTION: 402,
  RECEIPT_ALREADY_REDEEMED: 409,
  INTERNAL: 500,
};

const DEFAULT_MESSAGE: Record<SubscriptionErrorKind, string> = {
  NOT_FOUND: "Assinante ou assinatura não encontrada.",
  FORBIDDEN: "Credenciais do assinante não conferem.",
  INVALID_ARGUMENTS: "Argumentos inválidos.",
  INVALID_LEVEL: "Transição de nível não permitida.",
  PROCESSOR_CONFLICT: "O processador existente não corresponde ao solicitado.",
  PAYMENT_REQUIRES_ACTION: "O pagamento requer uma ação adicional do cliente.",
  RECEIPT_ALREADY_REDEEMED: "Este pagamento já foi usado para emitir outra credencial.",
  INTERNAL: "Erro interno ao processar a assinatura.",
};

/**
 * Erro classificado do orquestrador de assinaturas. Cada operação rejeita com
 * exatamente um `kind`; erros de processador não classificados seguem sem
 * passar por aqui.
 */
export class SubscriptionError extends AppError {
  public readonly kind: SubscriptionErrorKind;

  constructor(kind: SubscriptionErrorKind, message?: string, options?: ErrorOptions) {
    super(message ?? DEFAULT_MESSAGE[kind], STATUS_BY_KIND[kind], kind !== "INTERNAL", undefined, options);
    this.kind = kind;
    this.name = "SubscriptionError";
  }

  static notFound(message?: string) {
    return new SubscriptionError("NOT_FOUND", message);
  }

  static forbidden(message?: string) {
    return new SubscriptionError("FORBIDDEN", message);
  }

  static invalidArguments(message?: string, cause?: unknown) {
    return new SubscriptionError("INVALID_ARGUMENTS", message, cause === undefined ? undefined : { cause });
  }

  static invalidLevel() {
    return new SubscriptionError("INVALID_LEVEL");
  }

  static processorConflict(message?: string) {
    return new SubscriptionError("PROCESSOR_CONFLICT", message);
  }

  static paymentRequiresAction(cause?: unknown) {
    return new SubscriptionError("PAYMENT_REQUIRES_ACTION", undefined, cause === undefined ? undefined : { cause });
  }

  static receiptAlreadyRedeemed() {
    return new SubscriptionError("RECEIPT_ALREADY_REDEEMED");
  }

  static internal(message: string) {
    return new SubscriptionError("INTERNAL", message);
  }
}

export function isSubscriptionError(error: unknown, kind?: SubscriptionErrorKind): error is SubscriptionError {
  return error instanceof SubscriptionError && (kind === undefined || error.kind === kind);
}
