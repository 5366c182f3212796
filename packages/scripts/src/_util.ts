// packages/scripts/src/_util.ts
import { fetch as undiciFetch } from "undici";
import { logger } from "@drawstats/lib";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export const normalizeSpaces = (s: string) => s.replace(/\u00A0/g, " ").replace(/\s+/g, " ").trim();

type RetryOpts = {
  attempts?: number;
  label?: string;
  minDelayMs?: number;
  factor?: number;
};

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOpts = {}): Promise<T> {
  const attempts = opts.attempts ?? 3;
  const label = opts.label ?? "retry";
  const minDelay = opts.minDelayMs ?? 1200;
  const factor = opts.factor ?? 2.2;

  let lastErr: unknown;
  for (let i = 1; i <= attempts; i++) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (i < attempts) {
        const wait = Math.round(minDelay * Math.pow(factor, i - 1));
        logger.warn(`[${label}] attempt ${i}/${attempts} failed; sleeping ${wait}ms`, { error: String(err) });
        await sleep(wait);
      }
    }
  }
  throw lastErr;
}

const BASE_HEADERS: Record<string, string> = {
  "user-agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "accept-language": "en-US,en;q=0.9",
};

/** GET a page as text; non-2xx is an error. */
export async function fetchText(url: string, timeoutMs: number): Promise<string> {
  logger.debug(`GET ${url}`);
  const res = await undiciFetch(url, {
    signal: AbortSignal.timeout(timeoutMs),
    headers: BASE_HEADERS,
  });
  if (!res.ok) throw new Error(`HTTP ${res.status} ${res.statusText} for ${url}`);
  return await res.text();
}
