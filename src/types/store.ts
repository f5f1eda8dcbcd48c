import type { IssuanceStatus, PaymentProvider, SubscriberLookupStatus } from "./enums.js";
import type { ProcessorCustomer, SubscriberRecord } from "./subscription.js";

export type SubscriberLookup =
  | { status: SubscriberLookupStatus.NOT_STORED }
  | { status: SubscriberLookupStatus.PASSWORD_MISMATCH }
  | { status: SubscriberLookupStatus.FOUND; record: SubscriberRecord };

export type SetProcessorCustomerResult =
  | { status: "updated"; record: SubscriberRecord }
  // Outro escritor definiu o cliente antes; `record` traz o estado vencedor
  | { status: "conflict"; record: SubscriberRecord };

/**
 * Tabela de assinantes. Todas as escritas são condicionais e reportam
 * conflito de forma distinta do sucesso.
 */
export interface SubscriberStore {
  get(user: Uint8Array, password: Uint8Array): Promise<SubscriberLookup>;

  /**
   * Cria o assinante, ou devolve o existente se a senha for a mesma.
   * Retorna `null` quando o usuário já existe com outra senha.
   */
  create(user: Uint8Array, password: Uint8Array, now: Date): Promise<SubscriberRecord | null>;

  accessedAt(user: Uint8Array, now: Date): Promise<void>;

  canceledAt(user: Uint8Array, now: Date): Promise<void>;

  setProcessorAndCustomerId(record: SubscriberRecord, customer: ProcessorCustomer, now: Date): Promise<SetProcessorCustomerResult>;

  subscriptionCreated(user: Uint8Array, subscriptionId: string, now: Date, level: number): Promise<void>;

  subscriptionLevelChanged(user: Uint8Array, now: Date, level: number, subscriptionId: string): Promise<void>;
}

export interface IssuanceRecord {
  readonly itemId: string;
  readonly provider: PaymentProvider;
  readonly fingerprint: string;
  readonly issuedAt: Date;
}

export type IssuanceResult =
  | { status: IssuanceStatus.RECORDED }
  | { status: IssuanceStatus.ALREADY_RECORDED; existing: IssuanceRecord };

export interface IssuanceLedger {
  /**
   * Insere o registro se ainda não existir para (itemId, provider). Nunca
   * sobrescreve um registro existente.
   */
  recordIssuance(itemId: string, provider: PaymentProvider, fingerprint: string, issuedAt: Date): Promise<IssuanceResult>;
}

/** Requisição cega já decodificada; opaca para o orquestrador. */
export interface ReceiptCredentialRequest {
  readonly serialized: Uint8Array;
}

export interface ReceiptCredentialResponse {
  readonly serialized: Uint8Array;
}

export type DecodeRequestResult =
  | { status: "decoded"; request: ReceiptCredentialRequest }
  | { status: "invalid"; reason: string };

export type IssueCredentialResult =
  | { status: "issued"; response: ReceiptCredentialResponse }
  | { status: "verification_failed"; reason: string };

/**
 * Primitiva de credenciais de recibo (zero-knowledge), fornecida pelo host.
 */
export interface ReceiptCredentialOperations {
  decodeRequest(serialized: Uint8Array): DecodeRequestResult;

  issueReceiptCredential(
    request: ReceiptCredentialRequest,
    expirationEpochSeconds: number,
    level: number
  ): IssueCredentialResult;
}
