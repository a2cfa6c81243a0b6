import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z.string().transform((val) => val === "true" || val === "1").default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // InvenTree server
  INVENTREE_URL: z.string().url().optional(),
  INVENTREE_TOKEN: z.string().optional(),
  INVENTREE_TIMEOUT_MS: z.coerce.number().min(500).default(15_000),

  // Import behaviour
  IMPORT_INTERACTIVE: booleanFlag("false"),
  IMPORT_DRY_RUN: booleanFlag("false"),
  IMPORT_MAX_RESULTS: z.coerce.number().int().min(1).max(100).default(10),
  IMPORT_DATASHEETS: z.enum(["upload", "link", "off"]).default("link"),
  IMPORT_CONFIG_DIR: z.string().default("config"),

  // DigiKey
  DIGIKEY_CLIENT_ID: z.string().optional(),
  DIGIKEY_CLIENT_SECRET: z.string().optional(),
  DIGIKEY_API_URL: z.string().url().default("https://api.digikey.com"),
  DIGIKEY_CURRENCY: z.string().default("EUR"),
  DIGIKEY_LANGUAGE: z.string().default("en"),
  DIGIKEY_LOCATION: z.string().default("DE"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: booleanFlag("true"),
});

export type Env = z.infer<typeof envSchema>;

export type DatasheetMode = Env["IMPORT_DATASHEETS"];

let env: Env | undefined;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  env = result.data;
  return env;
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}
