import { z } from "zod";
import { Article, Block, BlockData, Shelf, isKnownBlockType } from "./types";

/*
 * Wire format of an export request, as the editor stores it. Parsing is
 * lenient on content (unknown block types, style tokens and entity types pass
 * through and degrade at render time) and strict only on the shape needed to
 * walk the shelf.
 */

/** Documents without a version are treated as current. */
export const DEFAULT_DOC_VERSION = 3;

const id = z.union([z.string(), z.number()]).transform(String);
const text = z.string().nullish().transform((value) => value ?? "");
const count = z.number().int().nonnegative().catch(0);
const optionalId = id.optional().catch(undefined);
const optionalString = z.string().optional().catch(undefined);

const EntityDataSchema = z
  .object({
    href: optionalString,
    src: optionalString,
    size: z.union([z.number(), z.string()]).optional().catch(undefined),
    style: optionalString,
  })
  .passthrough();

const EntitySchema = z.object({
  type: z.string().catch(""),
  data: EntityDataSchema.catch({}),
});

const EntityRangeSchema = z.object({
  key: id,
  offset: count,
  length: count,
});

// non-string tokens become "", which resolves to no formatting
const styleToken = z.unknown().transform((value) => (typeof value === "string" ? value : ""));

const InlineStyleRangeSchema = z.object({
  style: styleToken,
  offset: count,
  length: count,
});

const BlockDataSchema = z
  .object({
    src: optionalId,
    label: optionalString,
    type: optionalString,
    align: optionalString,
    style: optionalString,
    depth: z.number().optional().catch(undefined),
    table: z.object({ cols: z.number() }).optional().catch(undefined),
  })
  .passthrough();

export const BlockSchema = z
  .object({
    key: id,
    type: z.string().catch("unstyled"),
    text,
    depth: count,
    offset: z.number().optional().catch(undefined),
    length: z.number().optional().catch(undefined),
    entityRanges: z.array(EntityRangeSchema).nullish().transform((value) => value ?? []),
    inlineStyleRanges: z.array(InlineStyleRangeSchema).nullish().transform((value) => value ?? []),
    data: BlockDataSchema.nullish().transform((value): BlockData => value ?? {}),
  })
  .transform(
    (wire): Block => ({
      key: wire.key,
      type: isKnownBlockType(wire.type) ? wire.type : "other",
      rawType: wire.type,
      text: wire.text,
      depth: wire.depth,
      offset: wire.offset,
      length: wire.length,
      entityRanges: wire.entityRanges,
      inlineStyleRanges: wire.inlineStyleRanges,
      data: wire.data,
    })
  );

const docVersion = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    const version = value === null || value === undefined || value === "" ? NaN : Number(value);
    return Number.isInteger(version) ? version : DEFAULT_DOC_VERSION;
  })
  .catch(DEFAULT_DOC_VERSION);

const ArticleSchema = z
  .object({
    name: text,
    description: z.string().nullish(),
    meta: z.object({ icon: z.string().nullish() }).nullish(),
    doc_version: docVersion,
    entity_map: z.record(EntitySchema).nullish(),
    blocks: z.array(BlockSchema).nullish(),
  })
  .transform(
    (wire): Article => ({
      name: wire.name,
      description: wire.description ?? undefined,
      meta: wire.meta ? { icon: wire.meta.icon ?? undefined } : undefined,
      docVersion: wire.doc_version,
      entityMap: wire.entity_map ?? {},
      blocks: wire.blocks ?? [],
    })
  );

const BookSchema = z.object({
  name: text,
  articles: z.array(ArticleSchema).nullish().transform((value) => value ?? []),
});

export const ShelfSchema = z
  .object({
    id,
    shelf_name: text,
    request_user_id: id,
    books: z.array(BookSchema),
  })
  .transform(
    (wire): Shelf => ({
      id: wire.id,
      name: wire.shelf_name,
      requestUserId: wire.request_user_id,
      books: wire.books,
    })
  );

export type ShelfInput = z.input<typeof ShelfSchema>;

export class ShelfValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid shelf: ${issues.join("; ")}`);
    this.name = "ShelfValidationError";
  }
}

export function parseShelf(input: unknown): Shelf {
  const parsed = ShelfSchema.safeParse(input);
  if (!parsed.success) {
    throw new ShelfValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
