import type { PaymentProvider } from "../types/enums.js";

/**
 * Código que processadores estilo Stripe devolvem quando a criação da
 * assinatura depende de confirmação do cliente (3DS, por exemplo).
 */
export const PAYMENT_REQUIRES_ACTION_CODE = "subscription_payment_intent_requires_action";

/**
 * Falha reportada por um adaptador de processador. O `code` é definido pelo
 * provedor e é comparado explicitamente pelo orquestrador.
 */
export class ProcessorError extends Error {
  public readonly provider: PaymentProvider;
  public readonly code: string;
  public readonly httpStatus?: number;

  constructor(provider: PaymentProvider, code: string, message: string, httpStatus?: number, options?: ErrorOptions) {
    super(message, options);
    this.provider = provider;
    this.code = code;
    this.httpStatus = httpStatus;
    this.name = "ProcessorError";
  }
}

export function hasProcessorCode(error: unknown, code: string): error is ProcessorError {
  return error instanceof ProcessorError && error.code === code;
}
