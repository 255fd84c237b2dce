import Jimp from "jimp";
import { RenderError, describeError } from "./errors";

type JimpImage = Awaited<ReturnType<typeof Jimp.read>>;

export type ImageFormat = "png" | "jpeg" | "gif" | "bmp" | "tiff";

export interface DecodedImage {
  width: number;
  height: number;
  format: ImageFormat;
}

/** Raw RGBA pixels, four bytes per pixel, row by row. */
export interface RawImage {
  width: number;
  height: number;
  data: Buffer;
}

export type Rgb = [number, number, number];

export interface ImageCodec {
  decode(data: Buffer): Promise<DecodedImage>;
  encode(pixels: RawImage, format: ImageFormat): Promise<Buffer>;
  /** Pads the picture with a solid frame of `borderWidthPx` in total. */
  addBorder(data: Buffer, borderWidthPx: number, rgb: Rgb): Promise<Buffer>;
}

const MIME_BY_FORMAT: Record<ImageFormat, string> = {
  png: Jimp.MIME_PNG,
  jpeg: Jimp.MIME_JPEG,
  gif: Jimp.MIME_GIF,
  bmp: Jimp.MIME_BMP,
  tiff: Jimp.MIME_TIFF,
};

function formatFromMime(mime: string): ImageFormat {
  switch (mime) {
    case Jimp.MIME_JPEG:
      return "jpeg";
    case Jimp.MIME_GIF:
      return "gif";
    case Jimp.MIME_BMP:
      return "bmp";
    case Jimp.MIME_TIFF:
      return "tiff";
    default:
      return "png";
  }
}

/** GIF output is not supported by jimp; such pictures are re-encoded as PNG. */
function writableMime(format: ImageFormat): string {
  return format === "gif" ? Jimp.MIME_PNG : MIME_BY_FORMAT[format];
}

export class JimpImageCodec implements ImageCodec {
  private async read(data: Buffer): Promise<JimpImage> {
    try {
      return await Jimp.read(data);
    } catch (error) {
      throw new RenderError(`Unrecognized image format: ${describeError(error)}`, "image-format", undefined, error);
    }
  }

  async decode(data: Buffer): Promise<DecodedImage> {
    const image = await this.read(data);
    return {
      width: image.bitmap.width,
      height: image.bitmap.height,
      format: formatFromMime(image.getMIME()),
    };
  }

  async encode(pixels: RawImage, format: ImageFormat): Promise<Buffer> {
    const image = new Jimp({ data: pixels.data, width: pixels.width, height: pixels.height });
    return image.getBufferAsync(writableMime(format));
  }

  async addBorder(data: Buffer, borderWidthPx: number, rgb: Rgb): Promise<Buffer> {
    const image = await this.read(data);
    const format = formatFromMime(image.getMIME());
    const width = image.bitmap.width + borderWidthPx;
    const height = image.bitmap.height + borderWidthPx;
    const frame = new Jimp(width, height, Jimp.rgbaToInt(rgb[0], rgb[1], rgb[2], 255));
    frame.composite(image, Math.floor(borderWidthPx / 2), Math.floor(borderWidthPx / 2));
    return frame.getBufferAsync(writableMime(format));
  }
}
