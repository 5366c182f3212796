import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { setLogSink } from "@drawstats/lib";
import { parseResultsPage, scrapeSince, scrapeYear, toYMD } from "./lottery_net.js";

function row(dateText: string, balls: number[], special: number, slug: string, specialClass: string): string {
  const lis = balls.map((n) => `<li class="ball">${n}</li>`).join("");
  return `<tr>
    <td style="text-align: center;"><a href="/draw">${dateText}</a></td>
    <td>
      <ul class="multi results ${slug}">${lis}<li class="${specialClass}">${special}</li></ul>
      <ul class="multi results ${slug} double-play"><li class="ball">1</li><li class="ball">2</li></ul>
    </td>
  </tr>`;
}

const pbRow = (dateText: string, balls: number[], special: number) =>
  row(dateText, balls, special, "powerball", "powerball");

const page = (...rows: string[]) =>
  `<html><body><table><tr><th>Date</th><th>Numbers</th></tr>${rows.join("")}</table></body></html>`;

describe("toYMD", () => {
  it("reads the results-page date format", () => {
    expect(toYMD("Wednesday March 26, 2025")).toBe("2025-03-26");
    expect(toYMD("  Tuesday Sept 3, 2024 ")).toBe("2024-09-03");
  });

  it("rejects impossible dates", () => {
    expect(toYMD("Sunday February 30, 2025")).toBeNull();
    expect(toYMD("Next Draw")).toBeNull();
  });
});

describe("parseResultsPage", () => {
  const lines: string[] = [];
  let restore: ((line: string) => void) | null = null;

  beforeEach(() => {
    lines.length = 0;
    restore = setLogSink((line) => lines.push(line));
  });

  afterEach(() => {
    if (restore) setLogSink(restore);
  });

  it("parses Powerball rows and ignores the Double Play list", () => {
    const html = page(
      pbRow("Wednesday March 26, 2025", [7, 14, 21, 45, 69], 26),
      pbRow("Saturday March 22, 2025", [3, 9, 15, 30, 60], 5),
    );
    expect(parseResultsPage(html, "powerball")).toEqual([
      { date: "2025-03-26", numbers: [7, 14, 21, 45, 69], specialBall: 26, type: "powerball" },
      { date: "2025-03-22", numbers: [3, 9, 15, 30, 60], specialBall: 5, type: "powerball" },
    ]);
  });

  it("parses Mega Millions rows", () => {
    const html = page(row("Friday March 21, 2025", [2, 11, 40, 58, 70], 25, "mega-millions", "mega-ball"));
    expect(parseResultsPage(html, "megamillions")).toEqual([
      { date: "2025-03-21", numbers: [2, 11, 40, 58, 70], specialBall: 25, type: "megamillions" },
    ]);
  });

  it("drops out-of-range draws with a warning", () => {
    const html = page(pbRow("Monday March 24, 2025", [1, 2, 3, 4, 70], 1));
    expect(parseResultsPage(html, "powerball")).toEqual([]);
    expect(lines.map((l) => JSON.parse(l).message)).toEqual(["Dropping out-of-range draw"]);
  });

  it("skips rows that are not draws", () => {
    const html = page(
      `<tr><td style="text-align: center;">No link</td><td></td></tr>`,
      pbRow("Saturday March 22, 2025", [3, 9, 15, 30], 5),
      row("Saturday March 22, 2025", [3, 9, 15, 30, 60], 5, "mega-millions", "mega-ball"),
    );
    expect(parseResultsPage(html, "powerball")).toEqual([]);
  });
});

describe("scraping", () => {
  const pages: Record<string, string> = {
    "https://example.test/powerball/numbers/2024": page(
      pbRow("Monday December 30, 2024", [5, 6, 7, 8, 9], 10),
      pbRow("Saturday December 28, 2024", [1, 2, 3, 4, 5], 6),
    ),
    "https://example.test/powerball/numbers/2025": page(
      pbRow("Wednesday March 26, 2025", [7, 14, 21, 45, 69], 26),
      pbRow("Saturday March 22, 2025", [3, 9, 15, 30, 60], 5),
    ),
  };

  beforeEach(() => {
    const prev = setLogSink(() => undefined);
    return () => {
      setLogSink(prev);
    };
  });

  it("retries a failed page fetch", async () => {
    const fetchPage = vi
      .fn<(url: string) => Promise<string>>()
      .mockRejectedValueOnce(new Error("HTTP 503 Service Unavailable"))
      .mockResolvedValueOnce(pages["https://example.test/powerball/numbers/2025"] ?? "");
    const draws = await scrapeYear("powerball", 2025, { fetchPage, baseUrl: "https://example.test", retryDelayMs: 0 });
    expect(draws.map((d) => d.date)).toEqual(["2025-03-26", "2025-03-22"]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("gives up after three attempts", async () => {
    const fetchPage = vi.fn<(url: string) => Promise<string>>().mockRejectedValue(new Error("HTTP 500"));
    await expect(
      scrapeYear("powerball", 2025, { fetchPage, baseUrl: "https://example.test", retryDelayMs: 0 }),
    ).rejects.toThrow("HTTP 500");
    expect(fetchPage).toHaveBeenCalledTimes(3);
  });

  it("walks every year since the latest stored draw", async () => {
    const fetched: string[] = [];
    const fetchPage = async (url: string) => {
      fetched.push(url);
      return pages[url] ?? page();
    };
    const draws = await scrapeSince(
      "powerball",
      "2024-12-28",
      { fetchPage, baseUrl: "https://example.test" },
      new Date("2025-03-30T12:00:00Z"),
    );
    expect(fetched).toEqual([
      "https://example.test/powerball/numbers/2024",
      "https://example.test/powerball/numbers/2025",
    ]);
    expect(draws.map((d) => d.date)).toEqual(["2025-03-26", "2025-03-22", "2024-12-30"]);
  });

  it("scrapes only the current year for an empty history", async () => {
    const fetchPage = vi.fn(async (url: string) => pages[url] ?? page());
    const draws = await scrapeSince("powerball", null, { fetchPage, baseUrl: "https://example.test" }, new Date("2025-03-30T12:00:00Z"));
    expect(fetchPage).toHaveBeenCalledOnce();
    expect(draws).toHaveLength(2);
  });
});
