import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { AppConfig } from "../config.js";
import type { BlobSink } from "./artifactStore.js";

type StorageConfig = AppConfig["storage"];

/**
 * Public URL of an uploaded object: CDN first, then a custom endpoint
 * (path-style), then the virtual-hosted AWS URL.
 */
export function publicObjectUrl(cfg: Pick<StorageConfig, "bucket" | "endpointUrl" | "cdnUrl">, key: string): string {
  if (cfg.cdnUrl) return `${cfg.cdnUrl.replace(/\/$/, "")}/${key}`;
  if (cfg.endpointUrl) return `${cfg.endpointUrl.replace(/\/$/, "")}/${cfg.bucket}/${key}`;
  return `https://${cfg.bucket}.s3.amazonaws.com/${key}`;
}

export function s3Client(cfg: StorageConfig): S3Client {
  return new S3Client({
    region: cfg.region,
    endpoint: cfg.endpointUrl,
    // MinIO and most S3 look-alikes only speak path-style
    forcePathStyle: Boolean(cfg.endpointUrl),
    credentials:
      cfg.accessKeyId && cfg.secretAccessKey
        ? { accessKeyId: cfg.accessKeyId, secretAccessKey: cfg.secretAccessKey }
        : undefined,
  });
}

export class S3BlobSink implements BlobSink {
  constructor(
    private readonly client: S3Client,
    private readonly cfg: StorageConfig
  ) {}

  async putObject(key: string, body: Uint8Array, contentType: string): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.cfg.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        CacheControl: "public, max-age=31536000, immutable",
        ACL: "public-read",
      })
    );
    return publicObjectUrl(this.cfg, key);
  }
}
