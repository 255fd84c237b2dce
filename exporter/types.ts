export const BLOCK_TYPES = [
  "unstyled",
  "header-two",
  "header-three",
  "header-step",
  "ordered-list-item",
  "unordered-list-item",
  "figure",
  "mdtable",
  "dictionary",
  "cell",
  "blockquote",
  "code-block",
  "video",
  "gist-block",
  "snippet",
] as const;

export type KnownBlockType = (typeof BLOCK_TYPES)[number];

/** Unrecognized tags are kept in `rawType` and routed as "other". */
export type BlockType = KnownBlockType | "other";

export interface EntityRange {
  key: string;
  offset: number;
  length: number;
}

export interface EntityData {
  href?: string;
  src?: string;
  size?: number | string;
  style?: string;
  [field: string]: unknown;
}

export interface Entity {
  type: "LINK" | "IMG" | string;
  data: EntityData;
}

export type EntityMap = Record<string, Entity>;

export interface LinkStyle {
  link: string;
}

export interface ImageStyle {
  img: Entity;
}

/** BOLD, ITALIC, ... arrive as strings; entity ranges are folded in as objects. */
export type StyleToken = string | LinkStyle | ImageStyle;

export interface InlineStyleRange {
  style: StyleToken;
  offset: number;
  length: number;
}

export interface BlockData {
  src?: string;
  label?: string;
  type?: string;
  align?: string;
  style?: string;
  depth?: number;
  table?: { cols: number };
  [field: string]: unknown;
}

export interface Block {
  key: string;
  type: BlockType;
  rawType: string;
  text: string;
  depth: number;
  offset?: number;
  length?: number;
  entityRanges: EntityRange[];
  inlineStyleRanges: InlineStyleRange[];
  data: BlockData;
}

export interface ArticleMeta {
  icon?: string;
}

export interface Article {
  name: string;
  description?: string;
  meta?: ArticleMeta;
  docVersion: number;
  entityMap: EntityMap;
  blocks: Block[];
}

export interface Book {
  name: string;
  articles: Article[];
}

export interface Shelf {
  id: string;
  name: string;
  requestUserId: string;
  books: Book[];
}

export function isKnownBlockType(type: string): type is KnownBlockType {
  return BLOCK_TYPES.some((known) => known === type);
}

/**
 * Builds a block with every optional field filled in. Used for the synthetic
 * terminal block and for the header-step prefix.
 */
export function createBlock(partial: Partial<Block> & { type: BlockType }): Block {
  return {
    key: partial.key ?? "",
    type: partial.type,
    rawType: partial.rawType ?? partial.type,
    text: partial.text ?? "",
    depth: partial.depth ?? 0,
    offset: partial.offset,
    length: partial.length,
    entityRanges: partial.entityRanges ?? [],
    inlineStyleRanges: partial.inlineStyleRanges ?? [],
    data: partial.data ?? {},
  };
}
