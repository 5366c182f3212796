// packages/scripts/src/sources/lottery_net.ts
// Yearly results pages from lottery.net, e.g. /powerball/numbers/2025
//
// Row shape (one <tr> per draw):
//   <td style="text-align: center;"><a href="...">Wednesday March 26, 2025</a></td>
//   <td><ul class="multi results powerball">
//         <li class="ball">3</li> ×5  <li class="powerball">12</li>
//       </ul> (Double Play list follows, ignored)</td>
import { load } from "cheerio";
import {
  checkDraw,
  drawsAfter,
  gameConfig,
  logger,
  resultsPageUrl,
  sortDraws,
  type Draw,
  type GameType,
  type RegularNumbers,
} from "@drawstats/lib";
import { normalizeSpaces, withRetry } from "../_util.js";

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

// "Wednesday March 26, 2025" → 2025-03-26
export function toYMD(dateText: string): string | null {
  const m = normalizeSpaces(dateText).match(/\b([A-Za-z]{3,9})\s+(\d{1,2}),?\s+(\d{4})$/);
  if (!m || m[1] === undefined) return null;
  const month = MONTHS.indexOf(m[1].slice(0, 3).toLowerCase());
  const day = Number(m[2]);
  const year = Number(m[3]);
  if (month < 0) return null;
  const js = new Date(Date.UTC(year, month, day));
  if (js.getUTCMonth() !== month || js.getUTCDate() !== day) return null;
  return js.toISOString().slice(0, 10);
}

function toBall(text: string): number | null {
  const s = normalizeSpaces(text);
  return /^\d{1,2}$/.test(s) ? Number(s) : null;
}

function isDateCell(style: string | undefined): boolean {
  return (style ?? "").replace(/\s+/g, "").toLowerCase().startsWith("text-align:center");
}

/**
 * Draws found on one results page. Rows that do not look like a draw are
 * skipped; draws outside the game's ranges are dropped with a warning.
 */
export function parseResultsPage(html: string, game: GameType): Draw[] {
  const cfg = gameConfig(game);
  const log = logger.child({ game, source: "lottery.net" });
  const $ = load(html);
  const out: Draw[] = [];

  $("tr").each((_, row) => {
    const tds = $(row).find("td");
    const dateCell = tds.filter((_, td) => isDateCell($(td).attr("style"))).first();
    const date = toYMD(dateCell.find("a").first().text());
    if (!date) return;

    const list = tds.eq(1).find(`ul.multi.results.${cfg.sourceSlug}`).first();
    if (!list.length) return;

    const balls = list
      .find("li.ball")
      .toArray()
      .slice(0, cfg.regularPick)
      .map((li) => toBall($(li).text()));
    const special = toBall(list.find(`li.${cfg.specialBallClass}`).first().text());

    const [a, b, c, d, e] = balls;
    if (a == null || b == null || c == null || d == null || e == null || special == null) return;
    const numbers: RegularNumbers = [a, b, c, d, e];

    const draw: Draw = { date, numbers, specialBall: special, type: game };
    const issues = checkDraw(draw, game);
    if (issues.length) {
      log.warn("Dropping out-of-range draw", { date, issues });
      return;
    }
    out.push(draw);
  });

  return out;
}

export type ScrapeDeps = {
  fetchPage: (url: string) => Promise<string>;
  baseUrl: string;
  /** Backoff base for retries; tests pass 0. */
  retryDelayMs?: number;
};

export async function scrapeYear(game: GameType, year: number, deps: ScrapeDeps): Promise<Draw[]> {
  const url = resultsPageUrl(game, year, deps.baseUrl);
  const html = await withRetry(() => deps.fetchPage(url), {
    attempts: 3,
    label: `${game} ${year}`,
    minDelayMs: deps.retryDelayMs,
  });
  const draws = parseResultsPage(html, game);
  logger.info("Scraped results page", { game, year, url, draws: draws.length });
  return draws;
}

/**
 * Every draw strictly after `latestDate`, newest first. Walks each year from
 * the latest stored draw's year (the current year when nothing is stored).
 */
export async function scrapeSince(
  game: GameType,
  latestDate: string | null,
  deps: ScrapeDeps,
  now: Date = new Date(),
): Promise<Draw[]> {
  const currentYear = now.getUTCFullYear();
  const fromYear = latestDate ? Number(latestDate.slice(0, 4)) : currentYear;

  const byDate = new Map<string, Draw>();
  for (let year = fromYear; year <= currentYear; year++) {
    for (const d of await scrapeYear(game, year, deps)) byDate.set(d.date, d);
  }
  return sortDraws(drawsAfter([...byDate.values()], latestDate));
}
