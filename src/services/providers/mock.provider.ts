import { v4 as uuidv4 } from "uuid";
import { logger } from "../../config/logger.js";
import { PAYMENT_REQUIRES_ACTION_CODE, ProcessorError } from "../../errors/ProcessorError.js";
import { PaymentProvider, type ClientPlatform } from "../../types/enums.js";
import type { CustomerAwareProcessor, ProcessorSubscription, ReceiptItem } from "../../types/processor.js";
import type { LevelAndCurrency, ProcessorCustomer } from "../../types/subscription.js";

interface MockCustomer {
  id: string;
  platform?: ClientPlatform;
  requiresAction: boolean;
}

interface MockPayment {
  itemId: string;
  paidAt: Date;
  level: number;
}

interface MockSubscription {
  id: string;
  customerId: string;
  templateId: string;
  level: number;
  status: "active" | "canceled";
  createdAt: Date;
  payments: MockPayment[];
}

export interface MockProcessorOptions {
  currency?: string;
  now?: () => Date;
}

/**
 * Processador em memória para desenvolvimento e testes. Não fala com nenhum
 * provedor real.
 */
export class MockSubscriptionProcessor implements CustomerAwareProcessor {
  readonly provider = PaymentProvider.MOCK;

  private readonly currency: string;
  private readonly now: () => Date;
  private readonly customers = new Map<string, MockCustomer>();
  private readonly subscriptions = new Map<string, MockSubscription>();
  private readonly updatesByIdempotencyKey = new Map<string, ProcessorSubscription>();

  constructor(options: MockProcessorOptions = {}) {
    this.currency = (options.currency ?? "usd").toLowerCase();
    this.now = options.now ?? (() => new Date());
  }

  async createCustomer(_subscriberUser: Uint8Array, platform?: ClientPlatform): Promise<ProcessorCustomer> {
    const id = `cus_mock_${uuidv4()}`;
    this.customers.set(id, { id, platform, requiresAction: false });
    logger.info({ customerId: id, platform }, "MOCK: Cliente criado");
    return { provider: this.provider, customerId: id };
  }

  async getSubscription(subscriptionId: string): Promise<ProcessorSubscription> {
    return this.toProcessorSubscription(this.findSubscription(subscriptionId));
  }

  async createSubscription(
    customerId: string,
    templateId: string,
    level: number,
    lastSubscriptionCreatedAt: number
  ): Promise<ProcessorSubscription> {
    const customer = this.customers.get(customerId);
    if (!customer) {
      throw new ProcessorError(this.provider, "resource_missing", `Cliente ${customerId} não existe`, 404);
    }
    if (customer.requiresAction) {
      throw new ProcessorError(this.provider, PAYMENT_REQUIRES_ACTION_CODE, "Pagamento requer confirmação do cliente", 402);
    }

    const createdAt = this.now();
    const subscription: MockSubscription = {
      id: `sub_mock_${uuidv4()}`,
      customerId,
      templateId,
      level,
      status: "active",
      createdAt,
      payments: [],
    };
    subscription.payments.push(this.newPayment(subscription, createdAt));
    this.subscriptions.set(subscription.id, subscription);

    logger.info({ subscriptionId: subscription.id, customerId, templateId, level, lastSubscriptionCreatedAt }, "MOCK: Assinatura criada");
    return this.toProcessorSubscription(subscription);
  }

  async updateSubscription(
    subscription: ProcessorSubscription,
    templateId: string,
    level: number,
    idempotencyKey: string
  ): Promise<ProcessorSubscription> {
    const updateKey = `${subscription.id}:${idempotencyKey}`;
    const previous = this.updatesByIdempotencyKey.get(updateKey);
    if (previous) {
      logger.info({ subscriptionId: subscription.id, idempotencyKey }, "MOCK: Atualização repetida, devolvendo resultado anterior");
      return previous;
    }

    const stored = this.findSubscription(subscription.id);
    if (stored.status !== "active") {
      throw new ProcessorError(this.provider, "subscription_canceled", `Assinatura ${stored.id} cancelada`, 400);
    }
    stored.templateId = templateId;
    stored.level = level;

    const updated = this.toProcessorSubscription(stored);
    this.updatesByIdempotencyKey.set(updateKey, updated);
    logger.info({ subscriptionId: stored.id, templateId, level }, "MOCK: Assinatura atualizada");
    return updated;
  }

  async getLevelAndCurrencyForSubscription(subscription: ProcessorSubscription): Promise<LevelAndCurrency> {
    const stored = this.findSubscription(subscription.id);
    return { level: stored.level, currency: this.currency };
  }

  async getReceiptItem(subscriptionId: string): Promise<ReceiptItem> {
    const stored = this.findSubscription(subscriptionId);
    const latest = stored.payments.at(-1);
    if (stored.status !== "active" || !latest) {
      throw new ProcessorError(this.provider, "subscription_not_paid", `Assinatura ${subscriptionId} sem pagamento ativo`, 402);
    }
    return { itemId: latest.itemId, paidAt: latest.paidAt, level: latest.level };
  }

  async cancelAllActiveSubscriptions(customerId: string): Promise<void> {
    if (!this.customers.has(customerId)) {
      logger.info({ customerId }, "MOCK: Cliente inexistente, nada a cancelar");
      return;
    }

    let canceled = 0;
    for (const subscription of this.subscriptions.values()) {
      if (subscription.customerId === customerId && subscription.status === "active") {
        subscription.status = "canceled";
        canceled++;
      }
    }
    logger.info({ customerId, canceled }, "MOCK: Assinaturas canceladas");
  }

  /**
   * Simula a cobrança do próximo ciclo, gerando um novo item de recibo.
   */
  recordPayment(subscriptionId: string, paidAt: Date = this.now()): ReceiptItem {
    const stored = this.findSubscription(subscriptionId);
    const payment = this.newPayment(stored, paidAt);
    stored.payments.push(payment);
    return { ...payment };
  }

  /**
   * Faz a próxima criação de assinatura deste cliente exigir confirmação.
   */
  requireActionFor(customerId: string, requiresAction = true): void {
    const customer = this.customers.get(customerId);
    if (!customer) {
      throw new ProcessorError(this.provider, "resource_missing", `Cliente ${customerId} não existe`, 404);
    }
    customer.requiresAction = requiresAction;
  }

  private findSubscription(subscriptionId: string): MockSubscription {
    const stored = this.subscriptions.get(subscriptionId);
    if (!stored) {
      throw new ProcessorError(this.provider, "resource_missing", `Assinatura ${subscriptionId} não existe`, 404);
    }
    return stored;
  }

  private newPayment(subscription: MockSubscription, paidAt: Date): MockPayment {
    return {
      itemId: `${subscription.id}_${subscription.payments.length + 1}`,
      paidAt,
      level: subscription.level,
    };
  }

  private toProcessorSubscription(subscription: MockSubscription): ProcessorSubscription {
    return { id: subscription.id, customerId: subscription.customerId, status: subscription.status };
  }
}
