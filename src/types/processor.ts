import type { ClientPlatform, PaymentProvider } from "./enums.js";
import type { LevelAndCurrency, ProcessorCustomer } from "./subscription.js";

/**
 * Um pagamento individual de uma assinatura. `itemId` é único dentro do
 * processador e identifica a cobrança, não a assinatura inteira.
 */
export interface ReceiptItem {
  readonly itemId: string;
  readonly paidAt: Date;
  readonly level: number;
}

export interface ProcessorSubscription {
  readonly id: string;
  readonly customerId: string;
  readonly status: string;
}

/**
 * Operações que todo processador suporta, inclusive os de loja de aplicativos
 * que não têm clientes gerenciados pelo servidor.
 */
export interface SubscriptionProcessor {
  readonly provider: PaymentProvider;

  /**
   * Pagamento canônico para a assinatura registrada. O mesmo itemId não pode
   * aparecer duas vezes no mesmo ciclo de cobrança.
   */
  getReceiptItem(subscriptionId: string): Promise<ReceiptItem>;

  /**
   * Cancela todas as assinaturas ativas do cliente. Cliente inexistente no
   * processador resolve normalmente.
   */
  cancelAllActiveSubscriptions(customerId: string): Promise<void>;
}

/**
 * Processador com clientes gerenciados pelo servidor (estilo Stripe).
 */
export interface CustomerAwareProcessor extends SubscriptionProcessor {
  createCustomer(subscriberUser: Uint8Array, platform?: ClientPlatform): Promise<ProcessorCustomer>;

  getSubscription(subscriptionId: string): Promise<ProcessorSubscription>;

  createSubscription(
    customerId: string,
    templateId: string,
    level: number,
    lastSubscriptionCreatedAt: number
  ): Promise<ProcessorSubscription>;

  updateSubscription(
    subscription: ProcessorSubscription,
    templateId: string,
    level: number,
    idempotencyKey: string
  ): Promise<ProcessorSubscription>;

  getLevelAndCurrencyForSubscription(subscription: ProcessorSubscription): Promise<LevelAndCurrency>;
}
