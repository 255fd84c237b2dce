import { DocxDocument, DocxTable, DocxTableCell, inches } from "./docxDocument";
import { Block } from "./types";

/*
 * Tables, dictionaries and lists arrive as a flat run of blocks. Whether a
 * block continues the structure before it is decided by looking at the block
 * right before it, so blocks must be fed in document order.
 */

export type TableState =
  | { kind: "none" }
  | { kind: "open"; table: DocxTable; columns: number; cell: number };

export type DictionaryState =
  | { kind: "none" }
  | { kind: "open"; table: DocxTable; cell: number };

export interface StructuralContext {
  table: TableState;
  dictionary: DictionaryState;
  headerStep: number;
  /** Accumulated depth; nested handlers read it, the dispatcher restores it. */
  depth: number;
}

export const BASE_DEPTH = 1;
export const DICTIONARY_COLUMNS = 3;
export const DICTIONARY_SHADING = "E7E7F9";
export const TABLE_STYLE = "Table Grid";

export function createStructuralContext(): StructuralContext {
  return {
    table: { kind: "none" },
    dictionary: { kind: "none" },
    headerStep: 0,
    depth: BASE_DEPTH,
  };
}

/**
 * Legacy documents encode the column count of a table in the depth of its
 * cells. Depth 1 collides with the three-column encoding, see
 * normalizeCellDepths.
 */
export function columnsForDepth(depth: number): number {
  switch (depth) {
    case 0:
      return 2;
    case 1:
      return 4;
    case 2:
      return 2;
    case 3:
      return 3;
    default:
      return 1;
  }
}

const NEUTRAL_DEPTHS = [1, 1, 1];

function peekDepths(blocks: Block[], start: number): number[] {
  if (start + 2 >= blocks.length) {
    return NEUTRAL_DEPTHS;
  }
  return [blocks[start].depth, blocks[start + 1].depth, blocks[start + 2].depth];
}

/**
 * Rewrites the [1, ?, 2] cell-depth pattern of legacy three-column tables to
 * depth 3. This is a heuristic: it recognizes the common shape and can
 * misread a four-column table whose third block happens to sit at depth 2.
 * Returns a new list; the input blocks are not modified.
 */
export function normalizeCellDepths(blocks: Block[]): Block[] {
  const result = blocks.slice();
  let index = 0;
  while (index < result.length) {
    const block = result[index];
    if (block.type === "cell") {
      const depths = peekDepths(result, index);
      if (block.depth === 1 && depths[2] === 2) {
        for (let offset = 0; offset < 3; offset++) {
          result[index + offset] = { ...result[index + offset], depth: 3 };
        }
        index += 1;
      }
    }
    index += 1;
  }
  return result;
}

function openTable(document: DocxDocument, columns: number): DocxTable {
  const table = document.addTable(1, columns);
  table.style = document.styles.getOrCreate(TABLE_STYLE, "table");
  table.autofit = false;
  return table;
}

function tableColumnsHint(block: Block): number | undefined {
  const cols = block.data.table?.cols;
  return typeof cols === "number" && cols > 0 ? Math.floor(cols) : undefined;
}

export function closeTable(context: StructuralContext): void {
  context.table = { kind: "none" };
}

/**
 * Finds the cell a `cell` block writes into, opening a table or a row when
 * needed. From document version 3 on, a cell carrying `data.table.cols` starts
 * a new table; older documents rely on the previous block.
 */
export function placeTableCell(
  document: DocxDocument,
  context: StructuralContext,
  block: Block,
  previous: Block | undefined,
  docVersion: number
): DocxTableCell {
  const hint = docVersion >= 3 ? tableColumnsHint(block) : undefined;
  const continues =
    context.table.kind === "open" &&
    (docVersion >= 3 ? hint === undefined : previous?.type === "cell" && previous.depth === block.depth);

  if (!continues || context.table.kind !== "open") {
    const columns = hint ?? columnsForDepth(block.depth);
    context.table = { kind: "open", table: openTable(document, columns), columns, cell: 0 };
  }

  const state = context.table;
  let row = state.table.lastRow;
  if (state.cell >= row.cells.length) {
    state.cell = 0;
    row = state.table.addRow();
  }
  const cell = row.cells[state.cell];
  state.cell += 1;
  return cell;
}

/**
 * Dictionaries are three-column tables: term, a narrow separator that never
 * gets text, definition. Even rows are shaded.
 */
export function placeDictionaryEntry(
  document: DocxDocument,
  context: StructuralContext,
  block: Block,
  previous: Block | undefined
): DocxTableCell {
  if (previous?.type !== "dictionary" || context.dictionary.kind !== "open") {
    const table = openTable(document, DICTIONARY_COLUMNS);
    table.columnWidths[1] = inches(0.17);
    context.dictionary = { kind: "open", table, cell: 0 };
  }

  const state = context.dictionary;
  let row = state.table.lastRow;
  if (state.cell >= row.cells.length) {
    state.cell = 0;
    row = state.table.addRow();
  }

  const rowIndex = state.table.rows.length - 1;
  if (rowIndex % 2 === 0) {
    for (const cell of row.cells) {
      cell.shading = DICTIONARY_SHADING;
    }
  }

  if (state.cell === 1) {
    row.cells[1].width = inches(0.3);
    state.cell = 2;
  }

  const cell = row.cells[state.cell];
  state.cell += 1;
  return cell;
}

export const MAX_ORDERED_LEVEL = 4;

/** Ordered lists only have styles up to level 4; deeper items fall back to 3. */
export function orderedListLevel(depth: number): number {
  const level = depth + 2;
  return level <= MAX_ORDERED_LEVEL ? level : 3;
}

export function unorderedListLevel(depth: number): number {
  return depth + 2;
}

export function listStyleName(type: "ordered-list-item" | "unordered-list-item", depth: number): string {
  return type === "ordered-list-item"
    ? `List Number ${orderedListLevel(depth)}`
    : `List Bullet ${unorderedListLevel(depth)}`;
}

/** Advances the header-step counter and returns the "n. " prefix. */
export function nextHeaderStep(context: StructuralContext): string {
  context.headerStep += 1;
  return `${context.headerStep}. `;
}

export type BlockquoteVariantName = "warning" | "question" | "default";

export interface BlockquoteVariant {
  name: BlockquoteVariantName;
  glyph: string;
  accentColor: string;
  shadingColor: string;
  borderColor: string;
}

export const BLOCKQUOTE_VARIANTS: Record<BlockquoteVariantName, BlockquoteVariant> = {
  warning: { name: "warning", glyph: "🚨", accentColor: "C0504D", shadingColor: "FFD9D9", borderColor: "FF0000" },
  question: { name: "question", glyph: "❓", accentColor: "8064A2", shadingColor: "E7FDF8", borderColor: "00CC00" },
  default: { name: "default", glyph: "ℹ️", accentColor: "4F81BD", shadingColor: "EAEEF2", borderColor: "404040" },
};

export function blockquoteVariant(style: unknown): BlockquoteVariant {
  if (style === "warning" || style === "question") {
    return BLOCKQUOTE_VARIANTS[style];
  }
  return BLOCKQUOTE_VARIANTS.default;
}

export function enterDepth(context: StructuralContext, depth: number): void {
  context.depth += depth;
}

export function exitDepth(context: StructuralContext, depth: number): void {
  context.depth -= depth;
}
