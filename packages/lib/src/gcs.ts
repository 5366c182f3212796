// packages/lib/src/gcs.ts
// ESM, server-only
import crypto from "node:crypto";
import { Storage } from "@google-cloud/storage";
import { logger } from "./logger.js";

let _storage: Storage | null = null;
function getStorage(): Storage {
  if (!_storage) _storage = new Storage();
  return _storage;
}

/** Minimal object-store surface the update job needs (GCS in production). */
export interface ObjectStore {
  readonly name: string;
  /** Object bytes, or null when the object does not exist. */
  read(objectPath: string): Promise<Buffer | null>;
  /** Write unless the stored bytes are identical. */
  write(args: {
    objectPath: string;
    contentType: string;
    body: Buffer;
    cacheControl?: string;
  }): Promise<{ uploaded: boolean }>;
}

/** Bucket from GCS_BUCKET / DATA_BUCKET, or null when cloud I/O is off. */
export function bucketFromEnv(env: { GCS_BUCKET?: string; DATA_BUCKET?: string }): string | null {
  const explicit = (env.GCS_BUCKET || env.DATA_BUCKET || "").trim();
  return explicit || null;
}

function errorCode(e: unknown): unknown {
  return typeof e === "object" && e !== null && "code" in e ? e.code : undefined;
}

/** Download an object if it exists. Returns null on 404. */
export async function downloadIfExists(
  bucketName: string,
  objectPath: string,
  storage: Storage = getStorage()
): Promise<Buffer | null> {
  try {
    const [buf] = await storage.bucket(bucketName).file(objectPath).download();
    return buf;
  } catch (e: unknown) {
    const code = errorCode(e);
    if (code === 404 || code === "404") return null;
    throw e;
  }
}

export function sha256(buf: Buffer | Uint8Array | string): string {
  return crypto.createHash("sha256").update(buf).digest("hex");
}

/** Upload only if content differs; sets sensible metadata. */
export async function upsertObject(args: {
  bucketName: string;
  objectPath: string;
  contentType: string;
  bodyBuffer: Buffer;
  cacheControl?: string;
  storage?: Storage;
}): Promise<{ uploaded: boolean }> {
  const { bucketName, objectPath, contentType, bodyBuffer, cacheControl } = args;
  const storage = args.storage ?? getStorage();

  // Idempotency: compare with existing
  const before = await downloadIfExists(bucketName, objectPath, storage);
  if (before && sha256(before) === sha256(bodyBuffer)) {
    logger.info("[GCS] Unchanged", { object: `gs://${bucketName}/${objectPath}` });
    return { uploaded: false };
  }

  await storage.bucket(bucketName).file(objectPath).save(bodyBuffer, {
    contentType,
    resumable: false,
    metadata: {
      cacheControl: cacheControl ?? "public, max-age=300, must-revalidate",
    },
  });

  logger.info("[GCS] Uploaded", { object: `gs://${bucketName}/${objectPath}`, bytes: bodyBuffer.length });
  return { uploaded: true };
}

export function gcsObjectStore(bucketName: string, storage?: Storage): ObjectStore {
  return {
    name: `gs://${bucketName}`,
    read: (objectPath) => downloadIfExists(bucketName, objectPath, storage),
    write: ({ objectPath, contentType, body, cacheControl }) =>
      upsertObject({ bucketName, objectPath, contentType, bodyBuffer: body, cacheControl, storage }),
  };
}

/** In-process store with the same idempotent write semantics. */
export function memoryObjectStore(seed: Record<string, string> = {}): ObjectStore & { objects: Map<string, Buffer> } {
  const objects = new Map<string, Buffer>(
    Object.entries(seed).map(([k, v]) => [k, Buffer.from(v, "utf8")])
  );
  return {
    name: "memory",
    objects,
    async read(objectPath) {
      return objects.get(objectPath) ?? null;
    },
    async write({ objectPath, body }) {
      const before = objects.get(objectPath);
      if (before && sha256(before) === sha256(body)) return { uploaded: false };
      objects.set(objectPath, body);
      return { uploaded: true };
    },
  };
}
