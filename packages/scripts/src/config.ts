// packages/scripts/src/config.ts
import { envSchema, parseLogLevel, type LogLevel } from "@drawstats/lib";
import { bucketFromEnv } from "@drawstats/lib/gcs";

export type JobConfig = {
  dataDir: string;
  bucket: string | null;
  baseUrl: string;
  httpTimeoutMs: number;
  cacheControl: string;
  logLevel: LogLevel;
};

/** Parse the job's environment once; invalid values fail fast. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): JobConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  return {
    dataDir: e.DATA_DIR,
    bucket: bucketFromEnv(e),
    baseUrl: e.LOTTERY_BASE_URL,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    cacheControl: e.JSON_CACHE_CONTROL,
    logLevel: parseLogLevel(e.LOG_LEVEL),
  };
}
