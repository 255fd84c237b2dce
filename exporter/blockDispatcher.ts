import { Alignment, DocxDocument, DocxParagraph, DocxRun, inches } from "./docxDocument";
import { ErrorCollector, RenderError, Result, fail, ok } from "./errors";
import { parseMarkdownTable } from "./markdownTable";
import { PictureServices, alignmentFor, insertPicture, isDataUri } from "./pictures";
import { InlineImage } from "./styleResolver";
import {
  StructuralContext,
  TABLE_STYLE,
  blockquoteVariant,
  closeTable,
  enterDepth,
  exitDepth,
  listStyleName,
  nextHeaderStep,
  placeDictionaryEntry,
  placeTableCell,
} from "./structureTracker";
import { buildRuns, writeRuns } from "./textRuns";
import { Block, EntityMap, InlineStyleRange, createBlock } from "./types";
import { resolveThumbnails } from "./video";

export const FONT_NAME = "Inter";
export const FONT_SIZE = 12;
export const FONT_COLOR = "404040";
export const HEADER_COLOR = "34AB76";
export const LINK_BLOCK_COLOR = "4CAEE3";
export const CODE_BORDER_COLOR = "365FDD";
export const CODE_FONT = "Courier New";

export interface RenderServices extends PictureServices {
  errors: ErrorCollector;
}

/**
 * Everything one article render mutates. Owned by the driver for the length
 * of the article and passed to every handler.
 */
export interface RenderState {
  document: DocxDocument;
  /** Paragraph the last handler wrote to; fallback text lands here. */
  paragraph: DocxParagraph | null;
  blocks: Block[];
  index: number;
  docVersion: number;
  entityMap: EntityMap;
  context: StructuralContext;
  services: RenderServices;
}

export function addParagraph(state: RenderState, styleName = "Normal"): DocxParagraph {
  const paragraph = state.document.addParagraph(styleName);
  paragraph.style.font.name = FONT_NAME;
  paragraph.style.font.color.rgb = FONT_COLOR;
  if (styleName === "Caption") {
    paragraph.style.font.size = 10;
    paragraph.alignment = "center";
  }
  state.paragraph = paragraph;
  return paragraph;
}

function styleRun(run: DocxRun, size: number, color: string = FONT_COLOR, bold?: boolean): DocxRun {
  run.font.name = FONT_NAME;
  run.font.size = size;
  run.font.color.rgb = color;
  if (bold !== undefined) run.font.bold = bold;
  return run;
}

/**
 * Builds the block's runs and writes them into `paragraph`. Inline images
 * that cannot be loaded leave their run in place and are reported.
 */
export async function writeBlockText(
  state: RenderState,
  block: Block,
  paragraph: DocxParagraph,
  extraRanges: InlineStyleRange[] = []
): Promise<DocxRun[]> {
  const runs = buildRuns(
    block.text,
    [...block.inlineStyleRanges, ...extraRanges],
    block.entityRanges,
    state.entityMap,
    state.services.errors
  );
  return writeRuns(paragraph, runs, async (run: DocxRun, image: InlineImage) => {
    try {
      await insertPicture(state.document, run, image.src, state.services, { sizeEmu: image.sizeEmu });
    } catch (error) {
      state.services.errors.report(RenderError.fromBlock(block.key, error));
    }
  });
}

interface PlacePictureOptions {
  label?: string;
  alignment?: Alignment;
  border?: boolean;
}

export async function placePicture(state: RenderState, url: string | undefined, options: PlacePictureOptions): Promise<void> {
  if (!url) return;
  closeTable(state.context);

  const label = isDataUri(url) ? undefined : options.label;
  const paragraph = addParagraph(state);
  paragraph.alignment = options.alignment ?? "left";
  await insertPicture(state.document, paragraph.addRun(), url, state.services, {
    border: options.border,
    description: label,
  });

  if (label) {
    const caption = addParagraph(state, "Caption");
    styleRun(caption.addRun(label), FONT_SIZE, FONT_COLOR, true);
  }
}

function blockLinkEntity(block: Block, entityMap: EntityMap): { href: string } | undefined {
  for (const range of block.entityRanges) {
    const entity = entityMap[String(range.key)];
    if (entity?.data?.style === "block") {
      return { href: typeof entity.data.href === "string" ? entity.data.href : "" };
    }
  }
  return undefined;
}

function renderBlockLink(state: RenderState, block: Block, href: string): void {
  const paragraph = addParagraph(state);
  const text = styleRun(paragraph.addRun(`${block.text}\n`), FONT_SIZE, LINK_BLOCK_COLOR);
  const link = styleRun(paragraph.addRun(href), FONT_SIZE);
  text.font.italic = true;
  link.font.italic = true;
}

async function renderUnstyled(state: RenderState, block: Block): Promise<void> {
  closeTable(state.context);
  const paragraph = addParagraph(state);
  await writeBlockText(state, block, paragraph);
}

function renderHeader(state: RenderState, block: Block): void {
  if (block.type === "header-two") {
    const paragraph = addParagraph(state, "heading 1");
    styleRun(paragraph.addRun(block.text), 16, HEADER_COLOR, true);
  } else {
    const paragraph = addParagraph(state);
    styleRun(paragraph.addRun(block.text), FONT_SIZE, FONT_COLOR, true);
  }
}

async function renderFigure(state: RenderState, block: Block): Promise<void> {
  await placePicture(state, block.data.src, {
    label: block.data.label,
    alignment: alignmentFor(block.data.align),
    border: true,
  });
}

function renderMarkdownTable(state: RenderState, block: Block): void {
  const { header, rows } = parseMarkdownTable(block.text);
  if (rows.length === 0) return;

  const table = state.document.addTable(1, header.length);
  table.style = state.document.styles.getOrCreate(TABLE_STYLE, "table");
  header.forEach((title, column) => table.cell(0, column).setText(title));
  for (const values of rows) {
    const row = table.addRow();
    values.forEach((value, column) => row.cells[column].setText(value));
  }
}

async function renderListItem(
  state: RenderState,
  block: Block,
  type: "ordered-list-item" | "unordered-list-item"
): Promise<void> {
  const styleName = listStyleName(type, block.depth);
  if (type === "ordered-list-item" && state.paragraph?.style.name !== styleName) {
    // an empty paragraph in between keeps Word from continuing the previous list
    addParagraph(state).addRun("\n");
  }
  const paragraph = addParagraph(state, styleName);
  await writeBlockText(state, block, paragraph);
}

async function renderDictionaryEntry(state: RenderState, block: Block): Promise<void> {
  const previous = state.blocks[state.index - 1];
  const cell = placeDictionaryEntry(state.document, state.context, block, previous);
  await writeBlockText(state, block, cell.paragraphs[0]);
}

async function renderTableCell(state: RenderState, block: Block): Promise<void> {
  const previous = state.blocks[state.index - 1];
  const cell = placeTableCell(state.document, state.context, block, previous, state.docVersion);
  await writeBlockText(state, block, cell.paragraphs[0]);
}

async function renderBlockquote(state: RenderState, block: Block): Promise<void> {
  closeTable(state.context);
  const variant = blockquoteVariant(block.data.style);
  const calloutStyle = state.document.getOrCreateStyle(`Callout ${variant.name}`);

  addParagraph(state);
  const table = state.document.addTable(1, 2);
  table.autofit = false;
  table.columnWidths[0] = inches(0.5);
  table.columnWidths[1] = inches(6.0);

  const [quoteCell, textCell] = table.rows[0].cells;
  quoteCell.width = inches(0.5);
  textCell.width = inches(6.0);

  const textParagraph = textCell.paragraphs[0];
  const quoteParagraph = quoteCell.paragraphs[0];
  textParagraph.style = calloutStyle;
  quoteParagraph.style = calloutStyle;

  styleRun(quoteParagraph.addRun(variant.glyph), FONT_SIZE, variant.accentColor);
  await writeBlockText(state, block, textParagraph);

  quoteCell.setBorder("start", { sz: 12, color: variant.borderColor, val: "single" });
  quoteCell.shading = variant.shadingColor;
  textCell.shading = variant.shadingColor;
}

async function renderHeaderStep(state: RenderState, block: Block): Promise<void> {
  const paragraph = addParagraph(state);
  const prefix = nextHeaderStep(state.context);
  const prefixBlock = createBlock({
    type: "unstyled",
    text: prefix,
    inlineStyleRanges: [{ style: "header-step", offset: 0, length: prefix.length }],
  });
  await writeBlockText(state, prefixBlock, paragraph);
  await writeBlockText(state, block, paragraph, [{ style: "header-step", offset: 0, length: Array.from(block.text).length }]);
}

function addMonospaceCell(state: RenderState, text: string): void {
  const table = state.document.addTable(1, 1);
  const cell = table.cell(0, 0);
  cell.setBorder("start", { sz: 12, color: CODE_BORDER_COLOR, val: "single" });
  const run = cell.setText(text);
  cell.paragraphs[0].style = state.document.getOrCreateStyle("HTML Preformatted");
  run.font.size = 10;
  run.font.name = CODE_FONT;
}

function renderCodeBlock(state: RenderState, block: Block): void {
  addParagraph(state);
  const information = state.document.addTable(1, 2);
  const label = information.cell(0, 0).setText(block.data.label ?? "");
  const language = information.cell(0, 1).setText(block.data.type ?? "");
  for (const run of [label, language]) {
    run.font.size = FONT_SIZE;
    run.font.name = FONT_NAME;
  }
  information.rows[0].height = inches(0.6);

  addMonospaceCell(state, block.text);
}

function renderGist(state: RenderState, block: Block): void {
  addParagraph(state);
  addMonospaceCell(state, block.data.src ?? "");
}

async function renderVideo(state: RenderState, block: Block): Promise<void> {
  const paragraph = addParagraph(state);
  paragraph.alignment = "center";

  const src = block.data.src;
  if (!src) return;

  try {
    const thumbnails = await resolveThumbnails(src, state.services.fetcher);
    if (thumbnails) {
      await placePicture(state, thumbnails.big, { alignment: "center", border: true });
    }
  } catch (error) {
    // the caption and link still go out without a thumbnail
    state.services.errors.report(RenderError.fromBlock(block.key, error));
  }

  const caption = addParagraph(state, "Caption");
  caption.addRun(block.data.label ?? "").font.bold = true;
  caption.addRun("\n");
  caption.addRun(src).font.bold = true;
}

async function renderFallback(state: RenderState, block: Block): Promise<void> {
  if (!block.text) return;
  const paragraph = state.paragraph ?? addParagraph(state);
  await writeBlockText(state, block, paragraph);
}

async function routeBlock(state: RenderState, block: Block): Promise<void> {
  switch (block.type) {
    case "unstyled": {
      const link = blockLinkEntity(block, state.entityMap);
      if (link) {
        renderBlockLink(state, block, link.href);
      } else {
        await renderUnstyled(state, block);
      }
      return;
    }
    case "header-two":
    case "header-three":
      renderHeader(state, block);
      return;
    case "figure":
      await renderFigure(state, block);
      return;
    case "mdtable":
      renderMarkdownTable(state, block);
      return;
    case "ordered-list-item":
    case "unordered-list-item":
      await renderListItem(state, block, block.type);
      return;
    case "dictionary":
      await renderDictionaryEntry(state, block);
      return;
    case "cell":
      await renderTableCell(state, block);
      return;
    case "blockquote":
      await renderBlockquote(state, block);
      return;
    case "header-step":
      await renderHeaderStep(state, block);
      return;
    case "code-block":
      renderCodeBlock(state, block);
      return;
    case "video":
      await renderVideo(state, block);
      return;
    case "gist-block":
      renderGist(state, block);
      return;
    case "snippet":
    case "other":
      await renderFallback(state, block);
      return;
    default: {
      const unhandled: never = block.type;
      throw new RenderError(`No handler for block type ${String(unhandled)}`, "block", block.key);
    }
  }
}

/**
 * Renders one block. The block's depth is added to the running depth for the
 * duration of the call. A failure is returned, not thrown, and leaves the
 * structural state as the failing handler left it.
 */
export async function dispatchBlock(state: RenderState, block: Block): Promise<Result<void>> {
  enterDepth(state.context, block.depth);
  try {
    await routeBlock(state, block);
    return ok(undefined);
  } catch (error) {
    return fail(RenderError.fromBlock(block.key, error));
  } finally {
    exitDepth(state.context, block.depth);
  }
}

export function describeBlock(block: Block): string {
  const preview = block.text.length > 40 ? `${block.text.substring(0, 40)}...` : block.text || "(empty)";
  return `${block.rawType}#${block.key} ${preview}`;
}
