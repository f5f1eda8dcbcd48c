export enum PaymentProvider {
  STRIPE = "stripe",
  BRAINTREE = "braintree",
  GOOGLE_PLAY_BILLING = "google_play_billing",
  APPLE_APP_STORE = "apple_app_store",
  MOCK = "mock",
}

export enum ClientPlatform {
  ANDROID = "android",
  IOS = "ios",
  DESKTOP = "desktop",
}

export enum SubscriberLookupStatus {
  NOT_STORED = "not_stored",
  PASSWORD_MISMATCH = "password_mismatch",
  FOUND = "found",
}

export enum IssuanceStatus {
  RECORDED = "recorded",
  ALREADY_RECORDED = "already_recorded",
}

export function parsePaymentProvider(value: string): PaymentProvider | null {
  const normalized = value.trim().toLowerCase();
  for (const provider of Object.values(PaymentProvider)) {
    if (provider === normalized) return provider;
  }
  return null;
}

