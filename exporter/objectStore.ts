import { DeleteObjectCommand, GetObjectCommand, ObjectCannedACL, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { ExporterConfig } from "./config";
import { DOCX_CONTENT_TYPE } from "./docxSerializer";

export interface ObjectStore {
  put(bucket: string, key: string, body: Buffer, contentType: string, acl?: ObjectCannedACL): Promise<string>;
  presignedGet(bucket: string, key: string, ttlSeconds: number): Promise<string>;
  delete(bucket: string, key: string): Promise<void>;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(region: string, client?: S3Client) {
    this.client = client ?? new S3Client({ region });
  }

  async put(bucket: string, key: string, body: Buffer, contentType: string, acl?: ObjectCannedACL): Promise<string> {
    await this.client.send(
      new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType, ACL: acl })
    );
    return `https://${bucket}.s3.amazonaws.com/${key}`;
  }

  async presignedGet(bucket: string, key: string, ttlSeconds: number): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: bucket, Key: key }), { expiresIn: ttlSeconds });
  }

  async delete(bucket: string, key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }
}

function requireBucket(config: ExporterConfig): string {
  if (!config.bucket) {
    throw new Error("No export bucket configured (EXPORT_BUCKET)");
  }
  return config.bucket;
}

export function exportKey(shelfId: string, userId: string, filename: string): string {
  return `export/${shelfId}/${userId}/${filename}`;
}

/**
 * Uploads a rendered document and returns a short-lived download link.
 * Errors propagate: without the upload there is nothing to hand back.
 */
export async function saveToObjectStore(
  store: ObjectStore,
  config: ExporterConfig,
  bytes: Buffer,
  shelfId: string,
  userId: string,
  filename: string
): Promise<string> {
  const bucket = requireBucket(config);
  const key = exportKey(shelfId, userId, filename);
  await store.put(bucket, key, bytes, DOCX_CONTENT_TYPE);
  console.log(`[objectStore] Uploaded ${bytes.length} bytes to ${bucket}/${key}`);
  return store.presignedGet(bucket, key, config.presignTtlSeconds);
}

/** Publishes an image under export/ and returns its CDN address. */
export async function uploadImage(
  store: ObjectStore,
  config: ExporterConfig,
  filename: string,
  bytes: Buffer,
  contentType: string
): Promise<string> {
  const bucket = requireBucket(config);
  const key = `export/${filename}`;
  const url = await store.put(bucket, key, bytes, contentType, "public-read");
  if (!config.cdnUrl) return url;
  return `${config.cdnUrl.replace(/\/+$/, "")}/${key}`;
}

export async function deleteImage(store: ObjectStore, config: ExporterConfig, url: string): Promise<void> {
  const bucket = requireBucket(config);
  const base = config.cdnUrl ? config.cdnUrl.replace(/\/+$/, "") : `https://${bucket}.s3.amazonaws.com`;
  if (!url.startsWith(base)) {
    throw new Error(`${url} is not served from ${base}`);
  }
  const key = url.slice(base.length).replace(/^\/+/, "");
  await store.delete(bucket, key);
}
