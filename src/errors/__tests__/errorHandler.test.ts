import { beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { captureException } from "../../config/sentry.js";
import { PaymentProvider } from "../../types/enums.js";
import { toErrorResponse } from "../errorHandler.js";
import { ProcessorError } from "../ProcessorError.js";
import { isSubscriptionError, SubscriptionError } from "../SubscriptionError.js";

vi.mock("../../config/sentry.js", () => ({
  captureException: vi.fn(),
}));

describe("toErrorResponse", () => {
  beforeEach(() => {
    vi.mocked(captureException).mockClear();
  });

  it("should map classified subscription errors to their status and kind", () => {
    expect(toErrorResponse(SubscriptionError.processorConflict("existing processor does not match"))).toEqual({
      statusCode: 409,
      body: { status: "error", message: "existing processor does not match", kind: "PROCESSOR_CONFLICT" },
    });
    expect(toErrorResponse(SubscriptionError.paymentRequiresAction()).statusCode).toBe(402);
    expect(captureException).not.toHaveBeenCalled();
  });

  it("should narrow subscription errors by kind", () => {
    const error: unknown = SubscriptionError.invalidLevel();

    expect(isSubscriptionError(error)).toBe(true);
    expect(isSubscriptionError(error, "INVALID_LEVEL")).toBe(true);
    expect(isSubscriptionError(error, "NOT_FOUND")).toBe(false);
    expect(isSubscriptionError(new Error("x"))).toBe(false);
  });

  it("should report internal subscription errors as server errors", () => {
    const response = toErrorResponse(SubscriptionError.internal("record should not be missing customer"));

    expect(response).toEqual({
      statusCode: 500,
      body: { status: "error", message: "Ocorreu um erro interno no servidor." },
    });
    expect(captureException).toHaveBeenCalledTimes(1);
  });

  it("should map zod errors to 400 with the issues", () => {
    const result = z.object({ level: z.number() }).safeParse({ level: "x" });
    if (result.success) throw new Error("falha de validação esperada");

    const response = toErrorResponse(result.error);

    expect(response.statusCode).toBe(400);
    expect(response.body.message).toBe("Dados de entrada inválidos.");
    expect(response.body.details).toEqual(result.error.issues);
  });

  it("should keep the provider code of unclassified processor errors", () => {
    const error = new ProcessorError(PaymentProvider.STRIPE, "card_declined", "declined", 402);

    expect(toErrorResponse(error, { operation: "updateSubscriptionLevel" })).toEqual({
      statusCode: 400,
      body: { status: "error", message: "Falha no processador de pagamento.", code: "card_declined" },
    });
    expect(captureException).toHaveBeenCalledWith(error, { operation: "updateSubscriptionLevel" });
  });

  it("should treat processor outages as bad gateway", () => {
    const error = new ProcessorError(PaymentProvider.BRAINTREE, "service_unavailable", "down", 503);

    expect(toErrorResponse(error).statusCode).toBe(502);
  });

  it("should hide unknown errors behind a generic message", () => {
    expect(toErrorResponse(new Error("boom"))).toEqual({
      statusCode: 500,
      body: { status: "error", message: "Ocorreu um erro interno no servidor." },
    });
  });
});
