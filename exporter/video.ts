import { BlobFetcher } from "./blobFetcher";
import { RenderError } from "./errors";

export type VideoProvider = "youtube" | "vimeo";

export interface VideoThumbnails {
  small: string;
  normal: string;
  big: string;
}

const VIMEO_PATTERN =
  /https?:\/\/(?:www\.|player\.)?vimeo.com\/(?:channels\/(?:\w+\/)?|groups\/([^/]*)\/videos\/|album\/(\d+)\/video\/|video\/|)(\d+)(?:$|\/|\?)/;

export function detectProvider(url: string): VideoProvider | undefined {
  if (url.includes("youtu")) return "youtube";
  if (url.includes("vimeo")) return "vimeo";
  return undefined;
}

/**
 * Accepts youtu.be/<id>, youtube.com/watch?v=<id>, /embed/<id> and /v/<id>.
 */
export function youtubeVideoId(url: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }
  if (parsed.hostname === "youtu.be") {
    return parsed.pathname.slice(1) || undefined;
  }
  if (parsed.hostname === "www.youtube.com" || parsed.hostname === "youtube.com") {
    if (parsed.pathname === "/watch") {
      return parsed.searchParams.get("v") ?? undefined;
    }
    if (parsed.pathname.startsWith("/embed/") || parsed.pathname.startsWith("/v/")) {
      return parsed.pathname.split("/")[2] || undefined;
    }
  }
  return undefined;
}

export function vimeoVideoId(url: string): string | undefined {
  const match = VIMEO_PATTERN.exec(url);
  // groups 1 and 2 hold the group name and album id
  return match ? match[3] : undefined;
}

interface VimeoVideoInfo {
  thumbnail_small?: string;
  thumbnail_medium?: string;
  thumbnail_large?: string;
}

function isVimeoInfoList(value: unknown): value is VimeoVideoInfo[] {
  return Array.isArray(value) && value.length > 0 && typeof value[0] === "object" && value[0] !== null;
}

/**
 * Thumbnail URLs for a video page, or undefined for providers we do not know.
 * Vimeo needs a metadata request; a failure there is an external-service
 * error.
 */
export async function resolveThumbnails(url: string, fetcher: BlobFetcher): Promise<VideoThumbnails | undefined> {
  const provider = detectProvider(url);
  if (provider === "youtube") {
    const id = youtubeVideoId(url);
    if (!id) return undefined;
    return {
      small: `https://img.youtube.com/vi/${id}/default.jpg`,
      normal: `https://img.youtube.com/vi/${id}/hqdefault.jpg`,
      big: `https://img.youtube.com/vi/${id}/sddefault.jpg`,
    };
  }
  if (provider === "vimeo") {
    const id = vimeoVideoId(url);
    if (!id) return undefined;
    const info = await fetcher.getJson(`http://vimeo.com/api/v2/video/${id}.json`);
    if (!isVimeoInfoList(info) || !info[0].thumbnail_large) {
      throw new RenderError(`Vimeo returned no thumbnails for video ${id}`, "external-service");
    }
    return {
      small: info[0].thumbnail_small ?? info[0].thumbnail_large,
      normal: info[0].thumbnail_medium ?? info[0].thumbnail_large,
      big: info[0].thumbnail_large,
    };
  }
  return undefined;
}
