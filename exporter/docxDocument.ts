export const EMU_PER_INCH = 914400;
export const EMU_PER_PIXEL = EMU_PER_INCH / 96;

export function inches(value: number): number {
  return Math.round(value * EMU_PER_INCH);
}

export function cm(value: number): number {
  return Math.round((value / 2.54) * EMU_PER_INCH);
}

export function pixels(value: number): number {
  return Math.round(value * EMU_PER_PIXEL);
}

/** Table and cell widths are written in twentieths of a point. */
export function emuToTwips(emu: number): number {
  return Math.round(emu / 635);
}

export type Alignment = "left" | "center" | "right";

export interface FontColor {
  rgb?: string;
}

/**
 * Character formatting shared by runs and paragraph styles. Colours are hex
 * strings without '#', sizes are points.
 */
export interface DocxFont {
  name?: string;
  size?: number;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strike?: boolean;
  subscript?: boolean;
  math?: boolean;
  noProof?: boolean;
  webHidden?: boolean;
  rtl?: boolean;
  shadow?: boolean;
  hidden?: boolean;
  csBold?: boolean;
  highlightColor?: string;
  color: FontColor;
}

export function createFont(init: Partial<DocxFont> = {}): DocxFont {
  return { ...init, color: { ...init.color } };
}

export interface DocxMedia {
  name: string;
  extension: string;
  data: Buffer;
}

export interface DocxPicture {
  media: DocxMedia;
  widthEmu: number;
  heightEmu: number;
  description?: string;
}

export interface DocxField {
  instruction: string;
  placeholder: string;
}

export interface DocxStyle {
  name: string;
  styleId: string;
  type: "paragraph" | "table";
  basedOn?: string;
  numbering?: { level: number; numId: number } | null;
  font: DocxFont;
}

export const BULLET_NUMBERING_ID = 1;
export const DECIMAL_NUMBERING_ID = 2;

export function styleIdFor(name: string): string {
  return name
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}

/** "List Bullet 3" is level index 2 of the bullet numbering; plain "List Bullet" is level 0. */
function numberingForStyle(name: string): { level: number; numId: number } | null {
  const match = /^List (Bullet|Number)(?: (\d+))?$/.exec(name);
  if (!match) return null;
  const numId = match[1] === "Bullet" ? BULLET_NUMBERING_ID : DECIMAL_NUMBERING_ID;
  const level = match[2] ? Math.min(parseInt(match[2], 10) - 1, 8) : 0;
  return { level, numId };
}

export class DocxStyleRegistry {
  private readonly byName = new Map<string, DocxStyle>();

  constructor() {
    this.getOrCreate("Normal");
    for (let level = 1; level <= 3; level++) {
      this.getOrCreate(`heading ${level}`).font.bold = true;
    }
    this.getOrCreate("Caption");
    this.getOrCreate("HTML Preformatted").font.name = "Courier New";
    this.getOrCreate("Table Grid", "table");
  }

  get(name: string): DocxStyle | undefined {
    return this.byName.get(name);
  }

  getOrCreate(name: string, type: DocxStyle["type"] = "paragraph"): DocxStyle {
    const existing = this.byName.get(name);
    if (existing) return existing;

    const style: DocxStyle = {
      name,
      styleId: styleIdFor(name),
      type,
      basedOn: type === "paragraph" && name !== "Normal" ? "Normal" : undefined,
      numbering: numberingForStyle(name),
      font: createFont(),
    };
    this.byName.set(name, style);
    return style;
  }

  all(): DocxStyle[] {
    return Array.from(this.byName.values());
  }
}

export class DocxRun {
  text: string;
  font: DocxFont = createFont();
  shading?: string;
  pageBreak = false;
  picture?: DocxPicture;
  field?: DocxField;
  /** Set for runs wrapped in a w:hyperlink. */
  hyperlink?: string;

  constructor(text = "") {
    this.text = text;
  }

  addPicture(media: DocxMedia, widthEmu: number, heightEmu: number): DocxPicture {
    this.picture = { media, widthEmu, heightEmu };
    return this.picture;
  }

  addPageBreak(): void {
    this.pageBreak = true;
  }
}

export class DocxParagraph {
  readonly type = "paragraph";
  style: DocxStyle;
  alignment?: Alignment;
  readonly runs: DocxRun[] = [];
  /** Formatting of the paragraph mark itself (w:pPr/w:rPr). */
  markFont?: DocxFont;

  constructor(style: DocxStyle) {
    this.style = style;
  }

  addRun(text = ""): DocxRun {
    const run = new DocxRun(text);
    this.runs.push(run);
    return run;
  }

  addHyperlinkRun(href: string, text: string): DocxRun {
    const run = this.addRun(text);
    run.hyperlink = href;
    return run;
  }

  get text(): string {
    return this.runs.map((run) => run.text).join("");
  }
}

export type BorderEdge = "start" | "top" | "end" | "bottom" | "insideH" | "insideV";

export interface BorderSpec {
  sz: number;
  val: string;
  color: string;
  space?: number;
  shadow?: boolean;
}

export class DocxTableCell {
  readonly paragraphs: DocxParagraph[];
  width?: number;
  shading?: string;
  readonly borders: Partial<Record<BorderEdge, BorderSpec>> = {};

  constructor(private readonly normalStyle: DocxStyle) {
    this.paragraphs = [new DocxParagraph(normalStyle)];
  }

  /** Replaces the cell content with a single run. */
  setText(text: string): DocxRun {
    this.paragraphs.splice(0, this.paragraphs.length, new DocxParagraph(this.normalStyle));
    return this.paragraphs[0].addRun(text);
  }

  setBorder(edge: BorderEdge, spec: BorderSpec): void {
    this.borders[edge] = { ...spec, color: spec.color.replace(/^#/, "") };
  }

  get text(): string {
    return this.paragraphs.map((paragraph) => paragraph.text).join("\n");
  }
}

export class DocxTableRow {
  readonly cells: DocxTableCell[];
  height?: number;

  constructor(columns: number, normalStyle: DocxStyle) {
    this.cells = Array.from({ length: columns }, () => new DocxTableCell(normalStyle));
  }
}

export class DocxTable {
  readonly type = "table";
  readonly rows: DocxTableRow[] = [];
  readonly columnWidths: (number | undefined)[];
  style: DocxStyle | undefined;
  autofit = true;

  constructor(rows: number, readonly columnCount: number, private readonly normalStyle: DocxStyle) {
    this.columnWidths = new Array<number | undefined>(columnCount).fill(undefined);
    for (let i = 0; i < rows; i++) {
      this.addRow();
    }
  }

  addRow(): DocxTableRow {
    const row = new DocxTableRow(this.columnCount, this.normalStyle);
    this.rows.push(row);
    return row;
  }

  get lastRow(): DocxTableRow {
    return this.rows.length > 0 ? this.rows[this.rows.length - 1] : this.addRow();
  }

  cell(row: number, column: number): DocxTableCell {
    const target = this.rows[row]?.cells[column];
    if (!target) {
      throw new RangeError(`No cell at row ${row}, column ${column}`);
    }
    return target;
  }

  /** Row texts, handy for inspection. */
  toMatrix(): string[][] {
    return this.rows.map((row) => row.cells.map((cell) => cell.text));
  }
}

export type DocxBodyElement = DocxParagraph | DocxTable;

/**
 * In-memory word-processing document. Handlers call it the way they would
 * call a DOCX library; docxSerializer turns it into an OOXML package.
 */
export class DocxDocument {
  readonly body: DocxBodyElement[] = [];
  readonly styles = new DocxStyleRegistry();
  readonly media: DocxMedia[] = [];

  addParagraph(styleName = "Normal"): DocxParagraph {
    const paragraph = new DocxParagraph(this.styles.getOrCreate(styleName));
    this.body.push(paragraph);
    return paragraph;
  }

  addTable(rows: number, columns: number): DocxTable {
    const table = new DocxTable(rows, columns, this.styles.getOrCreate("Normal"));
    this.body.push(table);
    return table;
  }

  addMedia(data: Buffer, extension: string): DocxMedia {
    const media: DocxMedia = { name: `image${this.media.length + 1}.${extension}`, extension, data };
    this.media.push(media);
    return media;
  }

  getOrCreateStyle(name: string): DocxStyle {
    return this.styles.getOrCreate(name);
  }

  /** Top-level paragraphs in document order; table content is not included. */
  get paragraphs(): DocxParagraph[] {
    return this.body.filter((element): element is DocxParagraph => element.type === "paragraph");
  }

  get tables(): DocxTable[] {
    return this.body.filter((element): element is DocxTable => element.type === "table");
  }
}
