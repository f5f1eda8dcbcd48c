import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { IssuanceStatus, parsePaymentProvider, type PaymentProvider } from "../types/enums.js";
import type { IssuanceLedger, IssuanceRecord, IssuanceResult } from "../types/store.js";

const UNIQUE_VIOLATION = "23505";

const issuedReceiptRowSchema = z.object({
  item_id: z.string(),
  processor: z.string(),
  fingerprint: z.string(),
  issued_at: z.string().datetime({ offset: true }).transform((value) => new Date(value)),
});

function toIssuanceRecord(data: unknown): IssuanceRecord {
  const row = issuedReceiptRowSchema.parse(data);
  const provider = parsePaymentProvider(row.processor);
  if (!provider) {
    throw new Error(`Processador desconhecido no registro de emissões: ${row.processor}`);
  }
  return { itemId: row.item_id, provider, fingerprint: row.fingerprint, issuedAt: row.issued_at };
}

/**
 * Registro de emissões no Supabase. A chave primária (processor, item_id)
 * garante no máximo uma linha por item de pagamento.
 */
export class SupabaseIssuedReceiptRepository implements IssuanceLedger {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {}

  async recordIssuance(itemId: string, provider: PaymentProvider, fingerprint: string, issuedAt: Date): Promise<IssuanceResult> {
    const { error } = await this.client.from(this.table).insert({
      item_id: itemId,
      processor: provider,
      fingerprint,
      issued_at: issuedAt.toISOString(),
    });

    if (!error) {
      return { status: IssuanceStatus.RECORDED };
    }

    if (error.code !== UNIQUE_VIOLATION) {
      logger.error({ error: error.message, provider, itemId }, "Erro ao registrar emissão de recibo");
      throw new Error("Erro ao registrar emissão de recibo.");
    }

    const existing = await this.find(itemId, provider);
    if (!existing) {
      throw new Error("Registro de emissão conflitante não encontrado.");
    }
    return { status: IssuanceStatus.ALREADY_RECORDED, existing };
  }

  async find(itemId: string, provider: PaymentProvider): Promise<IssuanceRecord | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select("item_id, processor, fingerprint, issued_at")
      .eq("processor", provider)
      .eq("item_id", itemId)
      .maybeSingle();

    if (error) {
      logger.error({ error: error.message, provider, itemId }, "Erro ao buscar emissão de recibo");
      throw new Error("Erro ao buscar emissão de recibo.");
    }

    return data ? toIssuanceRecord(data) : null;
  }
}
