// packages/scripts/src/update_lottery.ts
// Refresh draw histories and stats artifacts for Powerball and Mega Millions.
//
// Usage:
//   npm run update -- --game powerball --dry-run
//   npm run update -- --skip-scrape --force --no-upload -c 1
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import mri from "mri";
import pLimit from "p-limit";
import {
  GAME_TYPES,
  ValidationFailureError,
  computeStatsReport,
  latestDrawDate,
  logger,
  mergeDraws,
  drawsAfter,
  normalizeGameType,
  serializeError,
  setLogLevel,
  significantNumbers,
  validateStats,
  type Draw,
  type GameType,
  type LogContext,
  type Logger,
} from "@drawstats/lib";
import { gcsObjectStore } from "@drawstats/lib/gcs";
import { fetchText } from "./_util.js";
import { loadConfig } from "./config.js";
import { scrapeSince } from "./sources/lottery_net.js";
import { createArtifactStore, type ArtifactStore } from "./store.js";

export type UpdateOptions = {
  games: readonly GameType[];
  skipScrape?: boolean;
  force?: boolean;
  dryRun?: boolean;
  concurrency?: number;
};

export type UpdateDeps = {
  store: ArtifactStore;
  scrape: (game: GameType, latestDate: string | null) => Promise<Draw[]>;
  log?: Logger;
};

export type GameOutcome = {
  game: GameType;
  status: "updated" | "unchanged" | "failed";
  newDraws: number;
  totalDraws: number;
  /** Optimizer strategies that ran out of candidates (field published as null). */
  exhausted: string[];
  error?: LogContext;
};

async function updateGame(game: GameType, opts: UpdateOptions, deps: UpdateDeps, log: Logger): Promise<GameOutcome> {
  const stored = await deps.store.loadDraws(game);
  const latest = latestDrawDate(stored);
  log.info("Loaded draw history", { draws: stored.length, latest });

  const scraped = opts.skipScrape ? [] : await deps.scrape(game, latest);
  const fresh = drawsAfter(scraped, latest);
  const draws = mergeDraws(game, stored, fresh);
  log.info("Merged draws", { scraped: scraped.length, new: fresh.length, total: draws.length });

  if (!fresh.length && !opts.force && (await deps.store.hasStats(game))) {
    log.info("No new draws; stats are current");
    return { game, status: "unchanged", newDraws: 0, totalDraws: draws.length, exhausted: [] };
  }

  const { artifact, issues } = computeStatsReport(game, draws);
  const violations = validateStats(artifact);
  if (violations.length) throw new ValidationFailureError(game, violations);
  log.info("Stats computed", {
    significant: significantNumbers(artifact.regularNumbers),
    significantSpecial: significantNumbers(artifact.specialBallNumbers),
  });

  if (opts.dryRun) {
    log.info("Dry run; nothing written", { optimizedByPosition: artifact.optimizedByPosition });
  } else {
    await deps.store.saveDraws(game, draws);
    await deps.store.saveStats(game, artifact);
  }

  return {
    game,
    status: "updated",
    newDraws: fresh.length,
    totalDraws: draws.length,
    exhausted: issues.map((e) => e.strategy),
  };
}

/** One outcome per game; a failure in one game never blocks another. */
export async function runUpdate(opts: UpdateOptions, deps: UpdateDeps): Promise<GameOutcome[]> {
  const base = deps.log ?? logger;
  const limit = pLimit(Math.max(1, opts.concurrency ?? 2));

  return Promise.all(
    opts.games.map((game) =>
      limit(async (): Promise<GameOutcome> => {
        const log = base.child({ game });
        try {
          const outcome = await updateGame(game, opts, deps, log);
          log.info("Game finished", { status: outcome.status, newDraws: outcome.newDraws, totalDraws: outcome.totalDraws });
          return outcome;
        } catch (e) {
          const error = serializeError(e);
          log.error("Game failed", { error });
          return { game, status: "failed", newDraws: 0, totalDraws: 0, exhausted: [], error };
        }
      }),
    ),
  );
}

// ---------- CLI ----------

function asList(v: unknown): string[] {
  if (v === undefined || v === null || v === false) return [];
  return (Array.isArray(v) ? v : [v]).map(String);
}

export function parseGames(values: string[]): GameType[] {
  if (!values.length) return [...GAME_TYPES];
  const games = values.map((v) => {
    const g = normalizeGameType(v);
    if (!g) throw new Error(`Unknown --game "${v}" (expected ${GAME_TYPES.join(" | ")})`);
    return g;
  });
  return [...new Set(games)];
}

export async function main(argvIn: string[] = process.argv.slice(2)): Promise<GameOutcome[]> {
  const cfg = loadConfig();
  setLogLevel(cfg.logLevel);

  const argv = mri(argvIn, {
    string: ["game", "data-dir", "concurrency"],
    boolean: ["skip-scrape", "force", "dry-run", "upload"],
    default: { "skip-scrape": false, force: false, "dry-run": false, upload: true, concurrency: "2" },
    alias: { c: "concurrency" },
  });

  const games = parseGames(asList(argv.game));
  const dataDir = asList(argv["data-dir"])[0] ?? cfg.dataDir;
  const upload = argv.upload === true;
  const mirror = upload && cfg.bucket ? gcsObjectStore(cfg.bucket) : null;
  const concurrency = Math.max(1, Number(asList(argv.concurrency)[0] ?? 2) || 2);

  const opts: UpdateOptions = {
    games,
    skipScrape: argv["skip-scrape"] === true,
    force: argv.force === true,
    dryRun: argv["dry-run"] === true,
    concurrency,
  };
  logger.info("[update-lottery] Starting", { ...opts, dataDir, mirror: mirror?.name ?? null });

  const outcomes = await runUpdate(opts, {
    store: createArtifactStore({ dataDir, mirror, cacheControl: cfg.cacheControl }),
    scrape: (game, latest) =>
      scrapeSince(game, latest, {
        baseUrl: cfg.baseUrl,
        fetchPage: (url) => fetchText(url, cfg.httpTimeoutMs),
      }),
  });

  const failed = outcomes.filter((o) => o.status === "failed");
  logger.info("[update-lottery] Done", {
    outcomes: outcomes.map(({ game, status, newDraws, totalDraws }) => ({ game, status, newDraws, totalDraws })),
  });
  if (failed.length) process.exitCode = 1;
  return outcomes;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === path.resolve(process.argv[1])) {
  main().catch((e) => {
    logger.error("[update-lottery] Fatal", { error: serializeError(e) });
    process.exitCode = 1;
  });
}
