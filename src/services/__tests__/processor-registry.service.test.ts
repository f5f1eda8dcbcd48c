import { describe, expect, it } from "vitest";
import { PaymentProvider } from "../../types/enums.js";
import type { SubscriptionProcessor } from "../../types/processor.js";
import { isCustomerAware, ProcessorRegistry } from "../processor-registry.service.js";
import { MockSubscriptionProcessor } from "../providers/mock.provider.js";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function storeOnlyProcessor(provider: PaymentProvider): SubscriptionProcessor {
  return {
    provider,
    getReceiptItem: async (subscriptionId) => ({ itemId: `${subscriptionId}-item`, paidAt: new Date(0), level: 1 }),
    cancelAllActiveSubscriptions: async () => undefined,
  };
}

describe("ProcessorRegistry", () => {
  it("should build the mock processor from configuration", () => {
    const registry = ProcessorRegistry.fromConfig({ activeProcessors: ["mock"], mockCurrency: "eur" });

    expect(registry.providers()).toEqual([PaymentProvider.MOCK]);
    expect(registry.require(PaymentProvider.MOCK)).toBeInstanceOf(MockSubscriptionProcessor);
  });

  it("should keep explicitly registered processors and skip them in configuration", () => {
    const googlePlay = storeOnlyProcessor(PaymentProvider.GOOGLE_PLAY_BILLING);
    const registry = ProcessorRegistry.fromConfig(
      { activeProcessors: ["google_play_billing", "mock"], mockCurrency: "usd" },
      [googlePlay]
    );

    expect(registry.get(PaymentProvider.GOOGLE_PLAY_BILLING)).toBe(googlePlay);
    expect(registry.has(PaymentProvider.MOCK)).toBe(true);
  });

  it("should reject unknown processor slugs", () => {
    expect(() => ProcessorRegistry.fromConfig({ activeProcessors: ["paypal"], mockCurrency: "usd" })).toThrow(
      "Processador de pagamento 'paypal' não é suportado pelo sistema."
    );
  });

  it("should require real processors to be registered by the host", () => {
    expect(() => ProcessorRegistry.fromConfig({ activeProcessors: ["stripe"], mockCurrency: "usd" })).toThrow(
      "Processador 'stripe' precisa ser registrado explicitamente pelo host."
    );
  });

  it("should refuse to register the same provider twice", () => {
    const registry = new ProcessorRegistry([storeOnlyProcessor(PaymentProvider.APPLE_APP_STORE)]);

    expect(() => registry.register(storeOnlyProcessor(PaymentProvider.APPLE_APP_STORE))).toThrow(
      "Processador 'apple_app_store' já registrado."
    );
  });

  it("should return undefined from get and an INTERNAL error from require for missing providers", () => {
    const registry = new ProcessorRegistry();

    expect(registry.get(PaymentProvider.STRIPE)).toBeUndefined();
    expect(thrownBy(() => registry.require(PaymentProvider.STRIPE))).toMatchObject({ kind: "INTERNAL", statusCode: 500 });
  });

  it("should tell customer-aware processors apart from store-only ones", () => {
    const registry = new ProcessorRegistry([
      storeOnlyProcessor(PaymentProvider.APPLE_APP_STORE),
      new MockSubscriptionProcessor(),
    ]);

    expect(isCustomerAware(registry.require(PaymentProvider.MOCK))).toBe(true);
    expect(isCustomerAware(registry.require(PaymentProvider.APPLE_APP_STORE))).toBe(false);
    expect(thrownBy(() => registry.requireCustomerAware(PaymentProvider.APPLE_APP_STORE))).toMatchObject({
      kind: "INVALID_ARGUMENTS",
    });
    expect(registry.requireCustomerAware(PaymentProvider.MOCK).provider).toBe(PaymentProvider.MOCK);
  });
});
