import { z } from "zod";
import type { GetReceiptCredentialsRequest } from "../subscription.js";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Corpo da requisição de credencial de recibo: bytes da requisição cega em base64.
 */
export const receiptCredentialsRequestSchema = z.object({
  receiptCredentialRequest: z
    .string()
    .min(1, "receiptCredentialRequest é obrigatório")
    .regex(BASE64_PATTERN, "receiptCredentialRequest deve estar em base64"),
});

export type ReceiptCredentialsRequestDTO = z.infer<typeof receiptCredentialsRequestSchema>;

export function parseReceiptCredentialsRequest(body: unknown): GetReceiptCredentialsRequest {
  const { receiptCredentialRequest } = receiptCredentialsRequestSchema.parse(body);
  return {
    receiptCredentialRequest: new Uint8Array(Buffer.from(receiptCredentialRequest, "base64")),
  };
}
