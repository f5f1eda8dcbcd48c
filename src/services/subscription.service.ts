import { logger } from "../config/logger.js";
import { hasProcessorCode, PAYMENT_REQUIRES_ACTION_CODE } from "../errors/ProcessorError.js";
import { SubscriptionError } from "../errors/SubscriptionError.js";
import { IssuanceStatus, SubscriberLookupStatus, type ClientPlatform, type PaymentProvider } from "../types/enums.js";
import type { CustomerAwareProcessor, ReceiptItem } from "../types/processor.js";
import type {
  IssuanceLedger,
  ReceiptCredentialOperations,
  ReceiptCredentialResponse,
  SubscriberStore,
} from "../types/store.js";
import type {
  GetReceiptCredentialsRequest,
  LevelTransitionValidator,
  SubscriberCredentials,
  SubscriberRecord,
} from "../types/subscription.js";
import { sameLevelAndCurrency } from "../types/subscription.js";
import { receiptRequestFingerprint } from "../utils/fingerprint.js";
import type { ProcessorRegistry } from "./processor-registry.service.js";

export interface SubscriptionServiceDeps {
  store: SubscriberStore;
  registry: ProcessorRegistry;
  issuanceLedger: IssuanceLedger;
  receiptOperations: ReceiptCredentialOperations;
  fingerprintSecret: string;
}

export interface ReceiptResult {
  receiptCredentialResponse: ReceiptCredentialResponse;
  receiptItem: ReceiptItem;
  paymentProvider: PaymentProvider;
}

export interface UpdateSubscriptionLevelParams {
  credentials: SubscriberCredentials;
  // Registro lido antes via getSubscriber, evita uma leitura extra
  record: SubscriberRecord;
  processor: CustomerAwareProcessor;
  level: number;
  currency: string;
  idempotencyKey: string;
  subscriptionTemplateId: string;
  transitionValidator: LevelTransitionValidator;
}

export type PaymentSetupFunction<T extends CustomerAwareProcessor, R> = (processor: T, customerId: string) => Promise<R>;

const log = logger.child({ service: "subscription" });

/**
 * Orquestra a tabela de assinantes e os processadores de pagamento: cadastro,
 * cancelamento, vínculo de cliente, troca de nível e emissão de credenciais
 * de recibo.
 *
 * Nenhuma trava é mantida aqui. A segurança entre chamadas concorrentes vem das
 * escritas condicionais do store e da inserção única do registro de emissões.
 */
export class SubscriptionService {
  constructor(private readonly deps: SubscriptionServiceDeps) {}

  async getSubscriber(credentials: SubscriberCredentials): Promise<SubscriberRecord> {
    const lookup = await this.deps.store.get(credentials.subscriberUser, credentials.hmac);

    switch (lookup.status) {
      case SubscriberLookupStatus.PASSWORD_MISMATCH:
        throw SubscriptionError.forbidden("subscriberId mismatch");
      case SubscriberLookupStatus.NOT_STORED:
        throw SubscriptionError.notFound();
      case SubscriberLookupStatus.FOUND:
        return lookup.record;
    }
  }

  /**
   * Cria o assinante ou apenas atualiza o horário de acesso se ele já existir.
   */
  async updateSubscriber(credentials: SubscriberCredentials): Promise<void> {
    const { store } = this.deps;
    const lookup = await store.get(credentials.subscriberUser, credentials.hmac);

    if (lookup.status === SubscriberLookupStatus.PASSWORD_MISMATCH) {
      throw SubscriptionError.forbidden("subscriberId mismatch");
    }

    if (lookup.status === SubscriberLookupStatus.NOT_STORED) {
      const created = await store.create(credentials.subscriberUser, credentials.hmac, credentials.now);
      if (!created) {
        // Outro cadastro com a mesma identidade e outra senha venceu a corrida
        throw SubscriptionError.forbidden("subscriberId mismatch");
      }
      log.info("Assinante criado");
      return;
    }

    await store.accessedAt(credentials.subscriberUser, credentials.now);
    log.info("Acesso do assinante atualizado");
  }

  /**
   * Cancela as assinaturas no processador e só depois marca o registro como
   * cancelado, para que uma falha no meio deixe o registro ainda ativo.
   */
  async deleteSubscriber(credentials: SubscriberCredentials): Promise<void> {
    const { store, registry } = this.deps;
    const lookup = await store.get(credentials.subscriberUser, credentials.hmac);

    if (lookup.status !== SubscriberLookupStatus.FOUND) {
      throw SubscriptionError.notFound();
    }

    // Sem cliente no processador: o assinante nunca chegou a adicionar pagamento
    const customer = lookup.record.processorCustomer;
    if (customer) {
      await registry.require(customer.provider).cancelAllActiveSubscriptions(customer.customerId);
      log.info({ provider: customer.provider }, "Assinaturas canceladas no processador");
    }

    await store.canceledAt(credentials.subscriberUser, credentials.now);
    log.info("Assinante cancelado");
  }

  /**
   * Garante um cliente no processador e entrega (processador, customerId) para
   * `paymentSetup`, que inicia o cadastro do meio de pagamento.
   */
  async addPaymentMethodToCustomer<T extends CustomerAwareProcessor, R>(
    credentials: SubscriberCredentials,
    processor: T,
    clientPlatform: ClientPlatform | undefined,
    paymentSetup: PaymentSetupFunction<T, R>
  ): Promise<R> {
    const record = await this.getSubscriber(credentials);
    const customerId = await this.resolveCustomerId(credentials, record, processor, clientPlatform);
    return paymentSetup(processor, customerId);
  }

  private async resolveCustomerId(
    credentials: SubscriberCredentials,
    record: SubscriberRecord,
    processor: CustomerAwareProcessor,
    clientPlatform: ClientPlatform | undefined
  ): Promise<string> {
    const existing = record.processorCustomer;
    if (existing) {
      if (existing.provider !== processor.provider) {
        log.warn({ existing: existing.provider, requested: processor.provider }, "Processador existente não corresponde");
        throw SubscriptionError.processorConflict("existing processor does not match");
      }
      log.info({ provider: processor.provider }, "Cliente existente reutilizado");
      return existing.customerId;
    }

    const customer = await processor.createCustomer(credentials.subscriberUser, clientPlatform);
    const result = await this.deps.store.setProcessorAndCustomerId(
      record,
      { provider: processor.provider, customerId: customer.customerId },
      credentials.now
    );

    const persisted = result.record.processorCustomer;
    if (result.status === "conflict") {
      // O cliente criado acima fica órfão no processador
      log.warn({ provider: processor.provider }, "Cliente já definido por outra requisição");
      if (persisted && persisted.provider !== processor.provider) {
        throw SubscriptionError.processorConflict("existing processor does not match");
      }
    }

    if (!persisted || persisted.provider !== processor.provider) {
      throw SubscriptionError.internal("record should not be missing customer");
    }

    log.info({ provider: processor.provider }, "Cliente vinculado ao assinante");
    return persisted.customerId;
  }

  /**
   * Cria a assinatura no processador se ainda não houver uma; caso contrário
   * atualiza o nível, a menos que (nível, moeda) já sejam os pedidos.
   */
  async updateSubscriptionLevelForCustomer(params: UpdateSubscriptionLevelParams): Promise<void> {
    const { credentials, record, processor, level, idempotencyKey, subscriptionTemplateId, transitionValidator } = params;
    const currency = params.currency.toLowerCase();
    const { store } = this.deps;

    if (record.subscriptionId !== null) {
      const subscription = await processor.getSubscription(record.subscriptionId);
      const existing = await processor.getLevelAndCurrencyForSubscription(subscription);

      if (sameLevelAndCurrency(existing, { level, currency })) {
        log.info({ provider: processor.provider, level, currency }, "Nível e moeda já correspondem, nada a fazer");
        return;
      }

      if (!transitionValidator(existing.level, level)) {
        log.warn({ from: existing.level, to: level }, "Transição de nível rejeitada");
        throw SubscriptionError.invalidLevel();
      }

      const updated = await processor.updateSubscription(subscription, subscriptionTemplateId, level, idempotencyKey);
      await store.subscriptionLevelChanged(credentials.subscriberUser, credentials.now, level, updated.id);
      log.info({ provider: processor.provider, from: existing.level, to: level }, "Nível da assinatura alterado");
      return;
    }

    const customer = record.processorCustomer;
    if (!customer) {
      throw SubscriptionError.notFound("Assinante sem cliente no processador.");
    }
    if (customer.provider !== processor.provider) {
      throw SubscriptionError.processorConflict("existing processor does not match");
    }

    const lastSubscriptionCreatedAt = record.subscriptionCreatedAt ? Math.floor(record.subscriptionCreatedAt.getTime() / 1000) : 0;

    let subscriptionId: string;
    try {
      const created = await processor.createSubscription(customer.customerId, subscriptionTemplateId, level, lastSubscriptionCreatedAt);
      subscriptionId = created.id;
    } catch (err) {
      if (hasProcessorCode(err, PAYMENT_REQUIRES_ACTION_CODE)) {
        log.warn({ provider: processor.provider }, "Criação da assinatura requer ação do cliente");
        throw SubscriptionError.paymentRequiresAction(err);
      }
      throw err;
    }

    // Se esta escrita falhar a assinatura remota fica sem registro local; não há compensação
    await store.subscriptionCreated(credentials.subscriberUser, subscriptionId, credentials.now, level);
    log.info({ provider: processor.provider, level }, "Assinatura criada");
  }

  /**
   * Emite a credencial de recibo para o pagamento atual da assinatura. O
   * registro de emissões garante que um item de pagamento nunca gere duas
   * credenciais para requisições diferentes.
   */
  async createReceiptCredentials(
    credentials: SubscriberCredentials,
    request: GetReceiptCredentialsRequest,
    expiration: (receiptItem: ReceiptItem) => Date
  ): Promise<ReceiptResult> {
    const { registry, issuanceLedger, receiptOperations, fingerprintSecret } = this.deps;
    const record = await this.getSubscriber(credentials);

    if (record.subscriptionId === null) {
      throw SubscriptionError.notFound("Assinante sem assinatura ativa.");
    }

    const decoded = receiptOperations.decodeRequest(request.receiptCredentialRequest);
    if (decoded.status === "invalid") {
      throw SubscriptionError.invalidArguments("invalid receipt credential request", decoded.reason);
    }

    const customer = record.processorCustomer;
    const processor = customer ? registry.get(customer.provider) : undefined;
    if (!processor) {
      throw SubscriptionError.notFound("Processador da assinatura não encontrado.");
    }

    const receiptItem = await processor.getReceiptItem(record.subscriptionId);
    const fingerprint = receiptRequestFingerprint(fingerprintSecret, decoded.request.serialized);
    const issuance = await issuanceLedger.recordIssuance(receiptItem.itemId, processor.provider, fingerprint, credentials.now);

    if (issuance.status === IssuanceStatus.ALREADY_RECORDED && issuance.existing.fingerprint !== fingerprint) {
      log.warn({ provider: processor.provider, itemId: receiptItem.itemId }, "Item de pagamento já usado por outra requisição");
      throw SubscriptionError.receiptAlreadyRedeemed();
    }

    const expirationEpochSeconds = Math.floor(expiration(receiptItem).getTime() / 1000);
    const issued = receiptOperations.issueReceiptCredential(decoded.request, expirationEpochSeconds, receiptItem.level);
    if (issued.status === "verification_failed") {
      throw SubscriptionError.invalidArguments("receipt credential request failed verification", issued.reason);
    }

    log.info(
      { provider: processor.provider, itemId: receiptItem.itemId, level: receiptItem.level, retry: issuance.status === IssuanceStatus.ALREADY_RECORDED },
      "Credencial de recibo emitida"
    );

    return {
      receiptCredentialResponse: issued.response,
      receiptItem,
      paymentProvider: processor.provider,
    };
  }
}
