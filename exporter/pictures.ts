import { Alignment, DocxDocument, DocxPicture, DocxRun, cm, pixels } from "./docxDocument";
import { RenderError } from "./errors";
import { BlobFetcher } from "./blobFetcher";
import { ImageCodec, Rgb } from "./imageCodec";

export const IMAGES_MAX_WIDTH = cm(14.8);
export const PICTURE_BORDER_RGB: Rgb = [233, 240, 255];

export interface PictureServices {
  fetcher: BlobFetcher;
  codec: ImageCodec;
}

export interface LoadedImage {
  data: Buffer;
  /** Vector sources have no pixel size and are rejected before decoding. */
  contentType: string | null;
}

const DATA_URI = /^data:image\/[\w.+-]+;base64,/;

/** Inline pictures pasted into the editor; they get no frame and no caption. */
export function isDataUri(url: string): boolean {
  return DATA_URI.test(url);
}

export async function loadImage(url: string, fetcher: BlobFetcher): Promise<LoadedImage> {
  if (isDataUri(url)) {
    const [header, content] = url.split(",", 2);
    return { data: Buffer.from(content, "base64"), contentType: header.slice(5).split(";")[0] };
  }
  const blob = await fetcher.get(url);
  return { data: blob.data, contentType: blob.contentType };
}

export interface PictureOptions {
  border?: boolean;
  /** Fixed square size in EMU, used for inline images. */
  sizeEmu?: number;
  description?: string;
}

/**
 * Embeds an image into `run`. Pictures wider than the text column are scaled
 * down keeping their aspect ratio. Data URIs are never framed.
 */
export async function insertPicture(
  document: DocxDocument,
  run: DocxRun,
  url: string,
  services: PictureServices,
  options: PictureOptions = {}
): Promise<DocxPicture> {
  const image = await loadImage(url, services.fetcher);
  if (image.contentType?.startsWith("image/svg+xml")) {
    throw new RenderError(`SVG images are not supported: ${url}`, "image-format");
  }

  let data = image.data;
  if (options.border && !isDataUri(url)) {
    const original = await services.codec.decode(data);
    data = await services.codec.addBorder(data, Math.floor(original.width / 50), PICTURE_BORDER_RGB);
  }

  const decoded = await services.codec.decode(data);
  const media = document.addMedia(data, decoded.format);

  let width = options.sizeEmu ?? pixels(decoded.width);
  let height = options.sizeEmu ?? pixels(decoded.height);
  if (width > IMAGES_MAX_WIDTH) {
    const aspectRatio = width / height;
    width = IMAGES_MAX_WIDTH;
    height = Math.round(IMAGES_MAX_WIDTH / aspectRatio);
  }

  const picture = run.addPicture(media, width, height);
  picture.description = options.description;
  return picture;
}

export function alignmentFor(value: unknown): Alignment {
  if (value === "left" || value === "right" || value === "center") {
    return value;
  }
  return "center";
}
