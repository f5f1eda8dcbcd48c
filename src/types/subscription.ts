import type { PaymentProvider } from "./enums.js";

/**
 * Credenciais derivadas do subscriberId já autenticado pela camada de
 * transporte. Construídas por requisição e nunca alteradas.
 */
export interface SubscriberCredentials {
  readonly subscriberUser: Uint8Array;
  readonly hmac: Uint8Array;
  readonly now: Date;
}

export interface ProcessorCustomer {
  readonly provider: PaymentProvider;
  readonly customerId: string;
}

export interface SubscriberRecord {
  user: Uint8Array;
  password: Uint8Array;
  createdAt: Date;
  accessedAt: Date;
  canceledAt: Date | null;
  // Uma vez definido, nunca muda
  processorCustomer: ProcessorCustomer | null;
  // subscriptionId e subscriptionLevel andam juntos
  subscriptionId: string | null;
  subscriptionLevel: number | null;
  subscriptionCreatedAt: Date | null;
  subscriptionLevelChangedAt: Date | null;
}

export interface LevelAndCurrency {
  readonly level: number;
  readonly currency: string;
}

export interface GetReceiptCredentialsRequest {
  readonly receiptCredentialRequest: Uint8Array;
}

export type LevelTransitionValidator = (oldLevel: number, newLevel: number) => boolean;

export function createSubscriberCredentials(subscriberUser: Uint8Array, hmac: Uint8Array, now: Date = new Date()): SubscriberCredentials {
  return Object.freeze({
    subscriberUser: Uint8Array.from(subscriberUser),
    hmac: Uint8Array.from(hmac),
    now: new Date(now.getTime()),
  });
}

export function sameLevelAndCurrency(a: LevelAndCurrency, b: LevelAndCurrency): boolean {
  return a.level === b.level && a.currency.toLowerCase() === b.currency.toLowerCase();
}
