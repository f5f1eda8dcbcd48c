import type { SupabaseClient } from "@supabase/supabase-js";
import { env, type Env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { initSentry } from "./config/sentry.js";
import { createSupabaseAdmin } from "./config/supabase.js";
import { SupabaseIssuedReceiptRepository } from "./repositories/issued-receipt.repository.js";
import { SupabaseSubscriberRepository } from "./repositories/subscriber.repository.js";
import { ProcessorRegistry } from "./services/processor-registry.service.js";
import { SubscriptionService } from "./services/subscription.service.js";
import type { SubscriptionProcessor } from "./types/processor.js";
import type { IssuanceLedger, ReceiptCredentialOperations, SubscriberStore } from "./types/store.js";

export interface CreateSubscriptionServiceOptions {
  receiptOperations: ReceiptCredentialOperations;
  // Clientes reais (Stripe, Braintree, lojas) registrados pelo host
  processors?: readonly SubscriptionProcessor[];
  store?: SubscriberStore;
  issuanceLedger?: IssuanceLedger;
  supabase?: SupabaseClient;
  config?: Env;
}

export interface SubscriptionApp {
  subscriptionService: SubscriptionService;
  registry: ProcessorRegistry;
}

/**
 * Monta o orquestrador com o registro de processadores e os repositórios do
 * Supabase. Store e ledger podem ser substituídos pelo host.
 */
export function createSubscriptionService(options: CreateSubscriptionServiceOptions): SubscriptionApp {
  const config = options.config ?? env;

  initSentry();

  const registry = ProcessorRegistry.fromConfig(
    { activeProcessors: config.ACTIVE_PROCESSORS, mockCurrency: config.MOCK_PROCESSOR_CURRENCY },
    options.processors
  );

  let supabase = options.supabase;
  const getSupabase = (): SupabaseClient => {
    supabase ??= createSupabaseAdmin(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY);
    return supabase;
  };

  const store = options.store ?? new SupabaseSubscriberRepository(getSupabase(), config.SUBSCRIPTIONS_TABLE);
  const issuanceLedger = options.issuanceLedger ?? new SupabaseIssuedReceiptRepository(getSupabase(), config.ISSUED_RECEIPTS_TABLE);

  const subscriptionService = new SubscriptionService({
    store,
    registry,
    issuanceLedger,
    receiptOperations: options.receiptOperations,
    fingerprintSecret: config.RECEIPT_FINGERPRINT_SECRET,
  });

  logger.info({ env: config.NODE_ENV, providers: registry.providers() }, "SubscriptionService pronto");
  return { subscriptionService, registry };
}
