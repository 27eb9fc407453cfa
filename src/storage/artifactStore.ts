import { randomBytes } from "node:crypto";
import type Database from "better-sqlite3";
import { StorageError, StorageUnavailableError, errorMessage } from "../errors.js";

export interface Artifact {
  fingerprint: string;
  /** Public location of the image. */
  url: string;
  objectKey: string;
  storedAtMs: number;
  ttlSeconds: number;
}

/** Where image bytes go. Returns the public URL of the stored object. */
export interface BlobSink {
  putObject(key: string, body: Uint8Array, contentType: string): Promise<string>;
}

export interface ArtifactStore {
  /** Latest artifact for the fingerprint; fresh or not. */
  lookup(fingerprint: string): Artifact | null;
  /** `host` is the rendered page's hostname; it names a folder in the object key. */
  put(fingerprint: string, bytes: Uint8Array, ttlSeconds: number, host: string): Promise<Artifact>;
}

export function isFresh(artifact: Artifact, nowMs: number): boolean {
  return nowMs < artifact.storedAtMs + artifact.ttlSeconds * 1000;
}

interface ArtifactRow {
  fingerprint: string;
  url: string;
  object_key: string;
  stored_at_ms: number;
  ttl_seconds: number;
}

/** `<prefix>/<host>/<fingerprint>/<time36>-<rand>.png`; every put gets a fresh key. */
export function artifactObjectKey(prefix: string, host: string, fingerprint: string, nowMs: number): string {
  const stamp = nowMs.toString(36);
  const random = randomBytes(4).toString("hex");
  const base = prefix.replace(/\/+$/, "");
  const folder = host.toLowerCase().replace(/[^a-z0-9.-]/g, "_") || "_";
  return `${base ? base + "/" : ""}${folder}/${fingerprint}/${stamp}-${random}.png`;
}

/**
 * Artifact index kept in the ledger database, bytes kept in the blob sink.
 * A stale artifact is replaced by repointing the row at a new object; the old
 * object is left where it is.
 */
export class SqliteArtifactStore implements ArtifactStore {
  constructor(
    private readonly db: Database.Database,
    private readonly sink: BlobSink,
    private readonly opts: { keyPrefix: string; now?: () => number }
  ) {}

  lookup(fingerprint: string): Artifact | null {
    let row: ArtifactRow | undefined;
    try {
      row = this.db.prepare(`SELECT * FROM artifacts WHERE fingerprint = ?`).get(fingerprint) as
        | ArtifactRow
        | undefined;
    } catch (e) {
      throw new StorageUnavailableError(`Artifact index unavailable: ${errorMessage(e)}`, e);
    }
    if (!row) return null;
    return {
      fingerprint: row.fingerprint,
      url: row.url,
      objectKey: row.object_key,
      storedAtMs: row.stored_at_ms,
      ttlSeconds: row.ttl_seconds,
    };
  }

  async put(fingerprint: string, bytes: Uint8Array, ttlSeconds: number, host: string): Promise<Artifact> {
    const now = this.opts.now ?? Date.now;
    const objectKey = artifactObjectKey(this.opts.keyPrefix, host, fingerprint, now());

    let url: string;
    try {
      url = await this.sink.putObject(objectKey, bytes, "image/png");
    } catch (e) {
      throw new StorageError(`Upload failed for ${objectKey}: ${errorMessage(e)}`, e);
    }

    const artifact: Artifact = { fingerprint, url, objectKey, storedAtMs: now(), ttlSeconds };
    try {
      this.db
        .prepare(
          `
          INSERT INTO artifacts (fingerprint, url, object_key, stored_at_ms, ttl_seconds)
          VALUES (@fingerprint, @url, @objectKey, @storedAtMs, @ttlSeconds)
          ON CONFLICT(fingerprint) DO UPDATE SET
            url = excluded.url,
            object_key = excluded.object_key,
            stored_at_ms = excluded.stored_at_ms,
            ttl_seconds = excluded.ttl_seconds
        `
        )
        .run(artifact);
    } catch (e) {
      throw new StorageError(`Artifact index write failed for ${fingerprint}: ${errorMessage(e)}`, e);
    }
    return artifact;
  }
}
