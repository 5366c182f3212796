// packages/scripts/src/store.ts
// Local DATA_DIR files, optionally mirrored to an object store (GCS in production).
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  DecodeError,
  decodeDraws,
  decodeStats,
  encodeDraws,
  encodeStats,
  logger,
  objectPathFor,
  type ArtifactKind,
  type DrawCollection,
  type GameType,
  type StatsArtifact,
} from "@drawstats/lib";
import type { ObjectStore } from "@drawstats/lib/gcs";

const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

export type ArtifactStore = {
  loadDraws(game: GameType): Promise<DrawCollection>;
  hasStats(game: GameType): Promise<boolean>;
  loadStats(game: GameType): Promise<StatsArtifact | null>;
  saveDraws(game: GameType, draws: DrawCollection): Promise<void>;
  saveStats(game: GameType, artifact: StatsArtifact): Promise<void>;
};

export type ArtifactStoreOptions = {
  dataDir: string;
  /** null disables the cloud mirror. */
  mirror: ObjectStore | null;
  cacheControl?: string;
};

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

async function readLocal(file: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(file);
  } catch (e) {
    if (isNotFound(e)) return null;
    throw e;
  }
}

function parseJson(what: string, buf: Buffer): unknown {
  try {
    return JSON.parse(buf.toString("utf8"));
  } catch (e) {
    throw new DecodeError(what, [e instanceof Error ? e.message : String(e)]);
  }
}

export function createArtifactStore(opts: ArtifactStoreOptions): ArtifactStore {
  const { dataDir, mirror, cacheControl } = opts;
  const localPath = (game: GameType, kind: ArtifactKind) => path.join(dataDir, objectPathFor(game, kind));

  // Local file first, then the mirror; null when neither has it.
  async function read(game: GameType, kind: ArtifactKind): Promise<Buffer | null> {
    const local = await readLocal(localPath(game, kind));
    if (local) return local;
    if (!mirror) return null;
    const remote = await mirror.read(objectPathFor(game, kind));
    if (remote) logger.info("Loaded from mirror", { game, kind, store: mirror.name });
    return remote;
  }

  async function write(game: GameType, kind: ArtifactKind, json: unknown): Promise<void> {
    const body = Buffer.from(`${JSON.stringify(json, null, 2)}\n`, "utf8");
    const file = localPath(game, kind);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, body);
    logger.info("Wrote artifact", { game, kind, file, bytes: body.length });
    if (mirror) {
      await mirror.write({ objectPath: objectPathFor(game, kind), contentType: JSON_CONTENT_TYPE, body, cacheControl });
    }
  }

  return {
    async loadDraws(game) {
      const buf = await read(game, "draws");
      return buf ? decodeDraws(parseJson(`${game} draws`, buf), game) : [];
    },
    async hasStats(game) {
      return (await read(game, "stats")) !== null;
    },
    async loadStats(game) {
      const buf = await read(game, "stats");
      return buf ? decodeStats(parseJson(`${game} stats`, buf)) : null;
    },
    saveDraws: (game, draws) => write(game, "draws", encodeDraws(draws)),
    saveStats: (game, artifact) => write(game, "stats", encodeStats(artifact)),
  };
}
