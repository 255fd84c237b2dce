import { pixels } from "./docxDocument";
import { Entity, StyleToken } from "./types";

/** Reserved glyph the editor puts where an inline image sits. */
export const IMAGE_MARKER = "🖼";

export interface RunFormat {
  fontName: string;
  size: number;
  color: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  shading?: string;
}

export const DEFAULT_RUN_FORMAT: Readonly<RunFormat> = {
  fontName: "Inter",
  size: 12,
  color: "404040",
};

export interface InlineImage {
  src: string;
  /** Square edge in EMU; undefined keeps the picture's own size. */
  sizeEmu?: number;
}

export type FormattingInstruction =
  | { kind: "format"; patch: Partial<RunFormat> }
  | { kind: "link"; href: string }
  | { kind: "image"; image: InlineImage }
  | { kind: "none" };

const FORMAT_TOKENS: Record<string, Partial<RunFormat>> = {
  BOLD: { bold: true },
  ITALIC: { italic: true },
  UNDERLINE: { underline: true },
  CODE: { color: "4472C4", size: 12, fontName: "Times New Roman" },
  KBD: { shading: "E7E6E6", size: 11, fontName: "Courier New" },
  DFN: { shading: "B3C6E7" },
  "header-step": { bold: true, size: 10.5 },
};

const NONE: FormattingInstruction = { kind: "none" };

function imageFromEntity(entity: Entity): FormattingInstruction {
  const src = entity.data.src;
  if (typeof src !== "string" || !src) return NONE;
  const size = typeof entity.data.size === "number" ? entity.data.size : parseInt(String(entity.data.size), 10);
  return {
    kind: "image",
    image: { src, sizeEmu: Number.isFinite(size) && size > 0 ? pixels(size) : undefined },
  };
}

/**
 * Maps an inline style token to what should happen to the run. Unknown tokens
 * resolve to "none"; upstream data is not validated against a style list.
 */
export function resolveStyle(token: StyleToken): FormattingInstruction {
  if (typeof token === "string") {
    const patch = FORMAT_TOKENS[token];
    return patch ? { kind: "format", patch } : NONE;
  }
  if ("link" in token) {
    return typeof token.link === "string" ? { kind: "link", href: token.link } : NONE;
  }
  if ("img" in token && token.img) {
    return imageFromEntity(token.img);
  }
  return NONE;
}
