import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  HTTP_HOST: z.string().default("0.0.0.0"),
  HTTP_PORT: z.coerce.number().int().positive().default(4700),
  HTTP_BODY_LIMIT: z.coerce.number().int().positive().default(1_048_576),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  SERVICE_AUTH_TOKEN: z
    .string()
    .optional()
    .transform((value) =>
      value && value.trim().length > 0 ? value : undefined
    ),
  CATALOG_REPOSITORY_BACKEND: z
    .enum(["postgres", "memory"])
    .default("memory"),
  DATABASE_URL: z.string().url().optional(),
  GCP_PROJECT_ID: z.string().optional(),
  GCP_SERVICE_ACCOUNT_KEY: z.string().optional(),
  // Pub/Sub subscriptions for the two lifecycle streams
  ASSET_REGISTERED_SUBSCRIPTION: z.string().optional(),
  ASSET_FINALIZED_SUBSCRIPTION: z.string().optional(),
  MAX_DELIVERY_ATTEMPTS: z.coerce.number().int().positive().default(5),
  STORAGE_BACKEND: z.enum(["gcs", "memory", "none"]).default("gcs"),
  STORAGE_BUCKET: z.string().optional(),
  ALLOW_CATALOG_ONLY_DELETION: booleanFlag,
  STORAGE_ATTEMPT_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
  STORAGE_RETRIES: z.coerce.number().int().nonnegative().default(2),
  STORAGE_BACKOFF_BASE_MS: z.coerce.number().int().positive().default(200),
  STORAGE_BACKOFF_MAX_MS: z.coerce.number().int().positive().default(1_500),
  STORAGE_BREAKER_FAILURE_THRESHOLD: z.coerce
    .number()
    .int()
    .positive()
    .default(5),
  STORAGE_BREAKER_COOLDOWN_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(10_000),
  STORAGE_LIST_PAGE_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .max(1_000)
    .default(500),
  DELETION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
}).superRefine((env, ctx) => {
  // The in-process store forgets every object, so deletions would report
  // success while leaving the real bucket untouched.
  if (env.NODE_ENV === "production" && env.STORAGE_BACKEND === "memory") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["STORAGE_BACKEND"],
      message: "memory is not allowed in production",
    });
  }
});

export type Env = z.infer<typeof envSchema>;

let cachedConfig: Env | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`CatalogService configuration invalid: ${message}`);
  }
  return parsed.data;
}

export function loadConfig(): Env {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = parseEnv(process.env);
  return cachedConfig;
}

export function resetConfigCache() {
  cachedConfig = null;
}
