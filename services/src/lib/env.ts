import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  BOT_TOKEN: z.string({ required_error: "BOT_TOKEN is required" }).min(1, "BOT_TOKEN is required"),
  DATABASE_URL: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().optional().default("gpt-4.1-mini"),
  OPENAI_TRANSCRIPTION_MODEL: z.string().optional().default("whisper-1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional().default("info"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export const DEFAULT_DATABASE_FILE = "./buildtrack.db";

let cached: EnvConfig | null = null;

export function getEnv(): EnvConfig {
  if (!cached) {
    cached = EnvSchema.parse(process.env);
  }
  return cached;
}

// Accepts a bare path, `file:` / `sqlite:` URLs or `:memory:`.
export function resolveDatabasePath(databaseUrl: string | undefined): string {
  if (!databaseUrl) {
    return DEFAULT_DATABASE_FILE;
  }
  if (databaseUrl === ":memory:") {
    return databaseUrl;
  }
  const match = /^(?:sqlite|file):(?:\/\/)?(?<path>.+)$/.exec(databaseUrl);
  return match?.groups?.path ?? databaseUrl;
}
