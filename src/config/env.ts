import { z } from "zod";

const DEV_FINGERPRINT_SECRET = "dev-receipt-fingerprint-secret";

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.string().default("info"),
    LOGTAIL_TOKEN: z.string().optional(),

    SENTRY_DSN: z.string().optional(),
    SENTRY_ENVIRONMENT: z.string().optional(),
    SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
    SUBSCRIPTIONS_TABLE: z.string().min(1).default("subscriptions"),
    ISSUED_RECEIPTS_TABLE: z.string().min(1).default("issued_receipts"),

    RECEIPT_FINGERPRINT_SECRET: z.string().min(1).optional(),

    // Lista separada por vírgula, ex: "mock" ou "stripe,mock"
    ACTIVE_PROCESSORS: z
      .string()
      .default("mock")
      .transform((value) =>
        value
          .split(",")
          .map((item) => item.trim().toLowerCase())
          .filter((item) => item.length > 0)
      ),
    MOCK_PROCESSOR_CURRENCY: z.string().length(3).default("usd").transform((value) => value.toLowerCase()),
  })
  .superRefine((value, ctx) => {
    if (value.NODE_ENV === "production" && !value.RECEIPT_FINGERPRINT_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RECEIPT_FINGERPRINT_SECRET"],
        message: "RECEIPT_FINGERPRINT_SECRET é obrigatório em produção",
      });
    }
  })
  .transform((value) => ({
    ...value,
    RECEIPT_FINGERPRINT_SECRET: value.RECEIPT_FINGERPRINT_SECRET ?? DEV_FINGERPRINT_SECRET,
  }));

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Variáveis de ambiente inválidas: ${issues}`);
  }
  return Object.freeze(result.data);
}

export const env: Env = parseEnv(process.env);
