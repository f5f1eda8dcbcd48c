import { createHmac, timingSafeEqual } from "node:crypto";

/**
 * Impressão digital de uma requisição de credencial, guardada no registro de
 * emissões no lugar dos bytes originais.
 */
export function receiptRequestFingerprint(secret: string, serialized: Uint8Array): string {
  return createHmac("sha256", secret).update(serialized).digest("hex");
}

export function constantTimeEquals(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

export function fromHex(hex: string): Uint8Array {
  return new Uint8Array(Buffer.from(hex, "hex"));
}
