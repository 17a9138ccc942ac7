import { z } from "zod";
import { ConfigError } from "./errors";

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  BOOKKEEPING_CSV_PATH: z.string().min(1).default("./data/csv_files"),
  AI_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  AI_CONCURRENCY: z.coerce.number().int().positive().max(10).default(2),
});

export interface AppConfig {
  databaseUrl?: string;
  openai: {
    apiKey?: string;
    baseURL?: string;
    model: string;
  };
  csvInputPath: string;
  aiBatchSize: number;
  aiConcurrency: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings in .env files mean "unset"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = envSchema.safeParse(cleaned);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`, { issues });
  }

  const vars = parsed.data;
  return {
    databaseUrl: vars.DATABASE_URL,
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      baseURL: vars.OPENAI_BASE_URL,
      model: vars.OPENAI_MODEL,
    },
    csvInputPath: vars.BOOKKEEPING_CSV_PATH,
    aiBatchSize: vars.AI_BATCH_SIZE,
    aiConcurrency: vars.AI_CONCURRENCY,
  };
}
