import { describe, expect, it } from "vitest";
import { LogLevel } from "@drawstats/lib";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults and picks up the bucket", () => {
    expect(loadConfig({ DATA_BUCKET: "test-bucket", LOG_LEVEL: "debug" })).toEqual({
      dataDir: "data",
      bucket: "test-bucket",
      baseUrl: "https://www.lottery.net",
      httpTimeoutMs: 20000,
      cacheControl: "public, max-age=300, must-revalidate",
      logLevel: LogLevel.DEBUG,
    });
  });

  it("disables the mirror without a bucket", () => {
    expect(loadConfig({ DATA_DIR: "/tmp/draws" })).toMatchObject({ dataDir: "/tmp/draws", bucket: null });
  });

  it("fails fast on invalid values", () => {
    expect(() => loadConfig({ HTTP_TIMEOUT_MS: "-5", LOTTERY_BASE_URL: "not a url" })).toThrow(
      /^Invalid configuration: LOTTERY_BASE_URL: .+; HTTP_TIMEOUT_MS: /,
    );
  });
});
