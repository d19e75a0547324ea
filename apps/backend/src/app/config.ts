import { z } from "zod";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HOST: z.string().default("127.0.0.1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Project and region are passed through unchecked; the provider reports bad values.
  GCP_PROJECT: z.string().default(""),
  GCP_REGION: z.string().default(""),
  GCP_ACCESS_TOKEN: optionalString,
  VERTEX_API_BASE_URL: optionalString
});

export type AppConfig = {
  port: number;
  host: string;
  logLevel: z.infer<typeof ConfigSchema>["LOG_LEVEL"];
  gcp: {
    project: string;
    region: string;
    accessToken?: string;
    baseUrl?: string;
  };
};

// Read the process environment once at startup.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    gcp: {
      project: parsed.GCP_PROJECT,
      region: parsed.GCP_REGION,
      accessToken: parsed.GCP_ACCESS_TOKEN,
      baseUrl: parsed.VERTEX_API_BASE_URL
    }
  };
}
