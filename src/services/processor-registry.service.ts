import { logger } from "../config/logger.js";
import { SubscriptionError } from "../errors/SubscriptionError.js";
import { parsePaymentProvider, PaymentProvider } from "../types/enums.js";
import type { CustomerAwareProcessor, SubscriptionProcessor } from "../types/processor.js";
import { MockSubscriptionProcessor } from "./providers/mock.provider.js";

export interface ProcessorRegistryConfig {
  activeProcessors: readonly string[];
  mockCurrency: string;
}

/**
 * Mapeia cada PaymentProvider para o adaptador ativo. Montado uma vez no
 * startup e somente leitura depois disso.
 */
export class ProcessorRegistry {
  private readonly processors = new Map<PaymentProvider, SubscriptionProcessor>();

  constructor(processors: readonly SubscriptionProcessor[] = []) {
    for (const processor of processors) {
      this.register(processor);
    }
  }

  /**
   * Cria o registro a partir da configuração. Somente o processador MOCK pode
   * ser construído aqui; clientes reais são passados pelo host em `explicit`.
   */
  static fromConfig(config: ProcessorRegistryConfig, explicit: readonly SubscriptionProcessor[] = []): ProcessorRegistry {
    const registry = new ProcessorRegistry(explicit);

    for (const slug of config.activeProcessors) {
      const provider = parsePaymentProvider(slug);
      if (!provider) {
        throw new Error(`Processador de pagamento '${slug}' não é suportado pelo sistema.`);
      }
      if (registry.has(provider)) continue;
      registry.register(ProcessorRegistry.resolveProvider(provider, config));
    }

    logger.info({ providers: registry.providers() }, "ProcessorRegistry inicializado com sucesso.");
    return registry;
  }

  private static resolveProvider(provider: PaymentProvider, config: ProcessorRegistryConfig): SubscriptionProcessor {
    switch (provider) {
      case PaymentProvider.MOCK:
        logger.info("ProcessorRegistry: Modo MOCK ativado.");
        return new MockSubscriptionProcessor({ currency: config.mockCurrency });

      default:
        throw new Error(`Processador '${provider}' precisa ser registrado explicitamente pelo host.`);
    }
  }

  register(processor: SubscriptionProcessor): void {
    if (this.processors.has(processor.provider)) {
      throw new Error(`Processador '${processor.provider}' já registrado.`);
    }
    this.processors.set(processor.provider, processor);
  }

  has(provider: PaymentProvider): boolean {
    return this.processors.has(provider);
  }

  get(provider: PaymentProvider): SubscriptionProcessor | undefined {
    return this.processors.get(provider);
  }

  require(provider: PaymentProvider): SubscriptionProcessor {
    const processor = this.processors.get(provider);
    if (!processor) {
      throw SubscriptionError.internal(`Processador '${provider}' não registrado.`);
    }
    return processor;
  }

  /**
   * Retorna o adaptador com clientes gerenciados pelo servidor, se o provedor
   * suportar.
   */
  requireCustomerAware(provider: PaymentProvider): CustomerAwareProcessor {
    const processor = this.require(provider);
    if (!isCustomerAware(processor)) {
      throw SubscriptionError.invalidArguments(`Processador '${provider}' não gerencia clientes.`);
    }
    return processor;
  }

  providers(): PaymentProvider[] {
    return [...this.processors.keys()];
  }
}

export function isCustomerAware(processor: SubscriptionProcessor): processor is CustomerAwareProcessor {
  return (
    "createCustomer" in processor &&
    "createSubscription" in processor &&
    "updateSubscription" in processor &&
    "getSubscription" in processor &&
    "getLevelAndCurrencyForSubscription" in processor
  );
}
