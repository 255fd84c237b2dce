import { ObjectCannedACL } from "@aws-sdk/client-s3";
import { BlobFetcher, FetchedBlob } from "./blobFetcher";
import { RenderError } from "./errors";
import { DecodedImage, ImageCodec, ImageFormat, RawImage, Rgb } from "./imageCodec";
import { ObjectStore } from "./objectStore";

/*
 * In-process stand-ins for the network-facing collaborators, shared by the
 * test suites.
 */

export class FakeBlobFetcher implements BlobFetcher {
  readonly requested: string[] = [];
  private readonly blobs = new Map<string, FetchedBlob>();
  private readonly documents = new Map<string, unknown>();

  addBlob(url: string, data: Buffer, contentType = "image/png"): this {
    this.blobs.set(url, { data, contentType });
    return this;
  }

  addJson(url: string, value: unknown): this {
    this.documents.set(url, value);
    return this;
  }

  async get(url: string): Promise<FetchedBlob> {
    this.requested.push(url);
    const blob = this.blobs.get(url);
    if (!blob) {
      throw new RenderError(`Request to ${url} returned 404`, "external-service");
    }
    return blob;
  }

  async getJson(url: string): Promise<unknown> {
    this.requested.push(url);
    if (!this.documents.has(url)) {
      throw new RenderError(`Request to ${url} returned 404`, "external-service");
    }
    return this.documents.get(url);
  }
}

/** Fake pictures are the text "img:<width>x<height>:<format>". */
export function fakeImage(width: number, height: number, format: ImageFormat = "png"): Buffer {
  return Buffer.from(`img:${width}x${height}:${format}`);
}

const FAKE_IMAGE = /^img:(\d+)x(\d+):(png|jpeg|gif|bmp|tiff)$/;

function parseFormat(value: string): ImageFormat {
  switch (value) {
    case "jpeg":
    case "gif":
    case "bmp":
    case "tiff":
      return value;
    default:
      return "png";
  }
}

export class FakeImageCodec implements ImageCodec {
  readonly borders: { width: number; rgb: Rgb }[] = [];

  async decode(data: Buffer): Promise<DecodedImage> {
    const match = FAKE_IMAGE.exec(data.toString("utf8"));
    if (!match) {
      throw new RenderError("Unrecognized image format: not a fake image", "image-format");
    }
    return { width: parseInt(match[1], 10), height: parseInt(match[2], 10), format: parseFormat(match[3]) };
  }

  async encode(pixels: RawImage, format: ImageFormat): Promise<Buffer> {
    return fakeImage(pixels.width, pixels.height, format);
  }

  async addBorder(data: Buffer, borderWidthPx: number, rgb: Rgb): Promise<Buffer> {
    const image = await this.decode(data);
    this.borders.push({ width: borderWidthPx, rgb });
    return fakeImage(image.width + borderWidthPx, image.height + borderWidthPx, image.format);
  }
}

export interface StoredObject {
  body: Buffer;
  contentType: string;
  acl?: ObjectCannedACL;
}

export class FakeObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();

  async put(bucket: string, key: string, body: Buffer, contentType: string, acl?: ObjectCannedACL): Promise<string> {
    this.objects.set(`${bucket}/${key}`, { body, contentType, acl });
    return `https://${bucket}.s3.amazonaws.com/${key}`;
  }

  async presignedGet(bucket: string, key: string, ttlSeconds: number): Promise<string> {
    return `https://${bucket}.s3.amazonaws.com/${key}?X-Amz-Expires=${ttlSeconds}`;
  }

  async delete(bucket: string, key: string): Promise<void> {
    this.objects.delete(`${bucket}/${key}`);
  }
}
