import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  S3Client,
  S3ServiceException
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { NodeHttpHandler } from "@smithy/node-http-handler";
import { createReadStream } from "fs";
import path from "path";
import type { AppConfig } from "../config/env";
import { safeSegment } from "../utils/files";

export const CATALOG_KEY = "metadata/catalog.json";

const CONTENT_TYPES: Record<string, string> = {
  ".mp4": "video/mp4",
  ".webm": "video/webm",
  ".mkv": "video/x-matroska",
  ".vtt": "text/vtt",
  ".json": "application/json",
  ".txt": "text/plain"
};

export interface ObjectHead {
  size: number;
}

/**
 * The object store as the pipeline sees it. Keys are relative to the configured bucket.
 */
export interface BlobStore {
  readonly bucket: string;
  /** Throws if the bucket cannot be reached with the current credentials */
  verifyAccess(): Promise<void>;
  putFile(key: string, filePath: string, contentType: string): Promise<void>;
  putText(key: string, body: string, contentType: string): Promise<void>;
  /** @returns The object's size, or null when there is no object at `key` */
  head(key: string): Promise<ObjectHead | null>;
  /** @returns The object's body, or null when there is no object at `key` */
  getText(key: string): Promise<string | null>;
}

export function createS3Client(config: AppConfig): S3Client {
  return new S3Client({
    region: config.awsRegion,
    ...(config.s3Endpoint ? { endpoint: config.s3Endpoint, forcePathStyle: true } : {}),
    maxAttempts: 10, // Increase retries for transient network errors
    requestHandler: new NodeHttpHandler({
      connectionTimeout: 5_000, // 5 seconds to establish connection
      socketTimeout: 300_000 // 5 minutes of inactivity allowed before timing out
    })
  });
}

export class S3BlobStore implements BlobStore {
  constructor(
    private client: S3Client,
    readonly bucket: string
  ) {}

  async verifyAccess(): Promise<void> {
    await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
  }

  /**
   * Streams a local file to S3 with a multipart upload.
   */
  async putFile(key: string, filePath: string, contentType: string): Promise<void> {
    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(filePath),
        ContentType: contentType
      },
      partSize: 1024 * 1024 * 8,
      queueSize: 2,
      leavePartsOnError: false
    });

    let lastLoggedMb = 0;
    upload.on("httpUploadProgress", (p) => {
      const mb = Math.floor((p.loaded ?? 0) / 1024 / 1024);
      if (mb - lastLoggedMb >= 50) {
        lastLoggedMb = mb;
        console.log(`[s3] ${key}: ${mb} MB uploaded`);
      }
    });

    await upload.done();
  }

  async putText(key: string, body: string, contentType: string): Promise<void> {
    const upload = new Upload({
      client: this.client,
      params: { Bucket: this.bucket, Key: key, Body: body, ContentType: contentType }
    });
    await upload.done();
  }

  /**
   * Metadata-only request; tells whether the object exists and how large it is
   * without downloading it.
   * @throws Error if a non-404 network or permission error occurs
   */
  async head(key: string): Promise<ObjectHead | null> {
    try {
      const res = await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key })
      );
      return { size: res.ContentLength ?? 0 };
    } catch (err: unknown) {
      if (isMissingObject(err)) return null;
      throw err;
    }
  }

  async getText(key: string): Promise<string | null> {
    try {
      const res = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );
      if (!res.Body) return null;
      return await res.Body.transformToString("utf-8");
    } catch (err: unknown) {
      if (isMissingObject(err)) return null;
      throw err;
    }
  }
}

function isMissingObject(err: unknown): boolean {
  if (err instanceof S3ServiceException) {
    return (
      err.$metadata?.httpStatusCode === 404 ||
      err.name === "NotFound" ||
      err.name === "NoSuchKey"
    );
  }
  return false;
}

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/**
 * @example
 * buildMediaKey("www-example-org", "abcdefghijk", ".mp4")
 * // returns "media/www-example-org/abcdefghijk.mp4"
 */
export function buildMediaKey(sourceId: string, contentId: string, ext: string): string {
  const suffix = ext.startsWith(".") ? ext : `.${ext}`;
  return `media/${safeSegment(sourceId)}/${safeSegment(contentId)}${suffix}`;
}

export function buildRawCaptionKey(sourceId: string, contentId: string, language: string): string {
  return `captions/raw/${safeSegment(sourceId)}/${safeSegment(contentId)}.${safeSegment(language)}.vtt`;
}

export function buildTranscriptKey(
  sourceId: string,
  contentId: string,
  format: "json" | "txt"
): string {
  return `captions/processed/${safeSegment(sourceId)}/${safeSegment(contentId)}.${format}`;
}

/**
 * @param timestamp - Run start time; colons and dots are replaced so the key is filename-safe
 */
export function buildRunSummaryKey(timestamp: Date): string {
  return `metadata/run_summary_${timestampSlug(timestamp)}.json`;
}

export function timestampSlug(timestamp: Date): string {
  return timestamp.toISOString().replace(/[:.]/g, "-");
}
