import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { parsePaymentProvider, SubscriberLookupStatus } from "../types/enums.js";
import type { SetProcessorCustomerResult, SubscriberLookup, SubscriberStore } from "../types/store.js";
import type { ProcessorCustomer, SubscriberRecord } from "../types/subscription.js";
import { constantTimeEquals, fromHex, toHex } from "../utils/fingerprint.js";

const UNIQUE_VIOLATION = "23505";

const timestamp = z.string().datetime({ offset: true }).transform((value) => new Date(value));

const subscriberRowSchema = z.object({
  subscriber_id: z.string(),
  password: z.string(),
  created_at: timestamp,
  accessed_at: timestamp,
  canceled_at: timestamp.nullable(),
  processor: z.string().nullable(),
  customer_id: z.string().nullable(),
  subscription_id: z.string().nullable(),
  subscription_level: z.number().int().nonnegative().nullable(),
  subscription_created_at: timestamp.nullable(),
  subscription_level_changed_at: timestamp.nullable(),
});

type SubscriberRow = z.infer<typeof subscriberRowSchema>;

function toProcessorCustomer(row: SubscriberRow): ProcessorCustomer | null {
  if (row.processor === null || row.customer_id === null) return null;
  const provider = parsePaymentProvider(row.processor);
  if (!provider) {
    throw new Error(`Processador desconhecido no registro do assinante: ${row.processor}`);
  }
  return { provider, customerId: row.customer_id };
}

export function toSubscriberRecord(data: unknown): SubscriberRecord {
  const row = subscriberRowSchema.parse(data);
  return {
    user: fromHex(row.subscriber_id),
    password: fromHex(row.password),
    createdAt: row.created_at,
    accessedAt: row.accessed_at,
    canceledAt: row.canceled_at,
    processorCustomer: toProcessorCustomer(row),
    subscriptionId: row.subscription_id,
    subscriptionLevel: row.subscription_level,
    subscriptionCreatedAt: row.subscription_created_at,
    subscriptionLevelChangedAt: row.subscription_level_changed_at,
  };
}

/**
 * Tabela de assinantes no Supabase. A chave é o subscriberUser em hex.
 */
export class SupabaseSubscriberRepository implements SubscriberStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {}

  async get(user: Uint8Array, password: Uint8Array): Promise<SubscriberLookup> {
    const record = await this.findByUser(user);
    if (!record) {
      return { status: SubscriberLookupStatus.NOT_STORED };
    }
    if (!constantTimeEquals(record.password, password)) {
      return { status: SubscriberLookupStatus.PASSWORD_MISMATCH };
    }
    return { status: SubscriberLookupStatus.FOUND, record };
  }

  async create(user: Uint8Array, password: Uint8Array, now: Date): Promise<SubscriberRecord | null> {
    const { data, error } = await this.client
      .from(this.table)
      .insert({
        subscriber_id: toHex(user),
        password: toHex(password),
        created_at: now.toISOString(),
        accessed_at: now.toISOString(),
      })
      .select()
      .single();

    if (!error) {
      return toSubscriberRecord(data);
    }

    if (error.code !== UNIQUE_VIOLATION) {
      logger.error({ error: error.message, table: this.table }, "Erro ao criar assinante");
      throw new Error("Erro ao criar assinante.");
    }

    // Já existe: só é o mesmo assinante se a senha conferir
    const lookup = await this.get(user, password);
    switch (lookup.status) {
      case SubscriberLookupStatus.FOUND:
        return lookup.record;
      case SubscriberLookupStatus.PASSWORD_MISMATCH:
        return null;
      case SubscriberLookupStatus.NOT_STORED:
        throw new Error("Assinante conflitante desapareceu durante a criação.");
    }
  }

  async accessedAt(user: Uint8Array, now: Date): Promise<void> {
    await this.updateByUser(user, { accessed_at: now.toISOString() }, "atualizar acesso do assinante");
  }

  async canceledAt(user: Uint8Array, now: Date): Promise<void> {
    await this.updateByUser(
      user,
      {
        accessed_at: now.toISOString(),
        canceled_at: now.toISOString(),
        subscription_id: null,
        subscription_level: null,
      },
      "cancelar assinante"
    );
  }

  async setProcessorAndCustomerId(
    record: SubscriberRecord,
    customer: ProcessorCustomer,
    now: Date
  ): Promise<SetProcessorCustomerResult> {
    const { data, error } = await this.client
      .from(this.table)
      .update({
        processor: customer.provider,
        customer_id: customer.customerId,
        accessed_at: now.toISOString(),
      })
      .eq("subscriber_id", toHex(record.user))
      .is("customer_id", null)
      .select();

    if (error) {
      logger.error({ error: error.message, table: this.table }, "Erro ao vincular cliente do processador");
      throw new Error("Erro ao vincular cliente do processador.");
    }

    const [updated] = data ?? [];
    if (updated) {
      return { status: "updated", record: toSubscriberRecord(updated) };
    }

    const current = await this.findByUser(record.user);
    if (!current) {
      throw new Error("Assinante não encontrado ao vincular cliente do processador.");
    }
    return { status: "conflict", record: current };
  }

  async subscriptionCreated(user: Uint8Array, subscriptionId: string, now: Date, level: number): Promise<void> {
    await this.updateByUser(
      user,
      {
        accessed_at: now.toISOString(),
        subscription_id: subscriptionId,
        subscription_level: level,
        subscription_created_at: now.toISOString(),
        subscription_level_changed_at: now.toISOString(),
      },
      "registrar assinatura criada"
    );
  }

  async subscriptionLevelChanged(user: Uint8Array, now: Date, level: number, subscriptionId: string): Promise<void> {
    await this.updateByUser(
      user,
      {
        accessed_at: now.toISOString(),
        subscription_id: subscriptionId,
        subscription_level: level,
        subscription_level_changed_at: now.toISOString(),
      },
      "registrar troca de nível"
    );
  }

  private async findByUser(user: Uint8Array): Promise<SubscriberRecord | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select("*")
      .eq("subscriber_id", toHex(user))
      .maybeSingle();

    if (error) {
      logger.error({ error: error.message, table: this.table }, "Erro ao buscar assinante");
      throw new Error("Erro ao buscar assinante.");
    }

    return data ? toSubscriberRecord(data) : null;
  }

  private async updateByUser(user: Uint8Array, patch: Record<string, string | number | null>, action: string): Promise<void> {
    const { error } = await this.client.from(this.table).update(patch).eq("subscriber_id", toHex(user));

    if (error) {
      logger.error({ error: error.message, table: this.table }, `Erro ao ${action}`);
      throw new Error(`Erro ao ${action}.`);
    }
  }
}
