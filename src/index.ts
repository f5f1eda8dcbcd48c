import "dotenv/config";

export { createSubscriptionService } from "./app.js";
export type { CreateSubscriptionServiceOptions, SubscriptionApp } from "./app.js";
export { AppError } from "./errors/AppError.js";
export { toErrorResponse } from "./errors/errorHandler.js";
export type { ErrorResponse, ErrorResponseBody } from "./errors/errorHandler.js";
export { PAYMENT_REQUIRES_ACTION_CODE, ProcessorError } from "./errors/ProcessorError.js";
export { isSubscriptionError, SubscriptionError } from "./errors/SubscriptionError.js";
export type { SubscriptionErrorKind } from "./errors/SubscriptionError.js";
export { SupabaseIssuedReceiptRepository } from "./repositories/issued-receipt.repository.js";
export { SupabaseSubscriberRepository } from "./repositories/subscriber.repository.js";
export { isCustomerAware, ProcessorRegistry } from "./services/processor-registry.service.js";
export { MockSubscriptionProcessor } from "./services/providers/mock.provider.js";
export { SubscriptionService } from "./services/subscription.service.js";
export type {
  PaymentSetupFunction,
  ReceiptResult,
  SubscriptionServiceDeps,
  UpdateSubscriptionLevelParams,
} from "./services/subscription.service.js";
export { parseReceiptCredentialsRequest, receiptCredentialsRequestSchema } from "./types/dtos/receipt-credentials.dto.js";
export { ClientPlatform, IssuanceStatus, PaymentProvider, SubscriberLookupStatus } from "./types/enums.js";
export type * from "./types/processor.js";
export type * from "./types/store.js";
export { createSubscriberCredentials, sameLevelAndCurrency } from "./types/subscription.js";
export type {
  GetReceiptCredentialsRequest,
  LevelAndCurrency,
  LevelTransitionValidator,
  ProcessorCustomer,
  SubscriberCredentials,
  SubscriberRecord,
} from "./types/subscription.js";
