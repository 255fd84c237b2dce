import JSZip from "jszip";
import {
  BULLET_NUMBERING_ID,
  DECIMAL_NUMBERING_ID,
  DocxDocument,
  DocxFont,
  DocxParagraph,
  DocxRun,
  DocxStyle,
  DocxTable,
  DocxTableCell,
  emuToTwips,
  styleIdFor,
} from "./docxDocument";

export const DOCX_CONTENT_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const NS_W = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
const NS_R = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const NS_WP = "http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing";
const NS_A = "http://schemas.openxmlformats.org/drawingml/2006/main";
const NS_PIC = "http://schemas.openxmlformats.org/drawingml/2006/picture";
const NS_PKG_RELS = "http://schemas.openxmlformats.org/package/2006/relationships";

const REL_TYPE = {
  officeDocument: `${NS_R}/officeDocument`,
  styles: `${NS_R}/styles`,
  numbering: `${NS_R}/numbering`,
  image: `${NS_R}/image`,
  hyperlink: `${NS_R}/hyperlink`,
};

const IMAGE_CONTENT_TYPES: Record<string, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  jpg: "image/jpeg",
  gif: "image/gif",
  bmp: "image/bmp",
  tiff: "image/tiff",
};

// XML 1.0 has no representation for these, not even as character references
const XML_FORBIDDEN_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

/**
 * Escapes XML special characters and drops characters XML cannot carry
 */
export function escapeXml(text: string): string {
  return text
    .replace(XML_FORBIDDEN_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

interface Relationship {
  id: string;
  type: string;
  target: string;
  external: boolean;
}

/**
 * Hands out relationship ids while document.xml is written, so hyperlinks and
 * pictures get their rIds in document order.
 */
class RelationshipTable {
  readonly entries: Relationship[] = [];
  private readonly mediaIds = new Map<string, string>();

  constructor() {
    this.add(REL_TYPE.styles, "styles.xml", false);
    this.add(REL_TYPE.numbering, "numbering.xml", false);
  }

  add(type: string, target: string, external: boolean): string {
    const id = `rId${this.entries.length + 1}`;
    this.entries.push({ id, type, target, external });
    return id;
  }

  forMedia(name: string): string {
    const existing = this.mediaIds.get(name);
    if (existing) return existing;
    const id = this.add(REL_TYPE.image, `media/${name}`, false);
    this.mediaIds.set(name, id);
    return id;
  }
}

interface SerializeContext {
  rels: RelationshipTable;
  nextDrawingId: number;
}

function onOff(tag: string, value: boolean | undefined): string {
  if (value === undefined) return "";
  return value ? `<w:${tag}/>` : `<w:${tag} w:val="0"/>`;
}

/** Run properties in the order the schema expects. */
export function serializeRunProperties(font: DocxFont, shading?: string, hyperlink = false): string {
  let xml = "";
  if (hyperlink) {
    xml += `<w:rStyle w:val="Hyperlink"/>`;
  }
  if (font.name) {
    const name = escapeXml(font.name);
    xml += `<w:rFonts w:ascii="${name}" w:hAnsi="${name}" w:cs="${name}"/>`;
  }
  xml += onOff("b", font.bold);
  xml += onOff("bCs", font.csBold);
  xml += onOff("i", font.italic);
  xml += onOff("strike", font.strike);
  xml += onOff("shadow", font.shadow);
  xml += onOff("noProof", font.noProof);
  xml += onOff("vanish", font.hidden);
  xml += onOff("webHidden", font.webHidden);
  if (font.color.rgb) {
    xml += `<w:color w:val="${escapeXml(font.color.rgb)}"/>`;
  } else if (hyperlink) {
    xml += `<w:color w:val="0563C1"/>`;
  }
  if (font.size) {
    const halfPoints = Math.round(font.size * 2);
    xml += `<w:sz w:val="${halfPoints}"/><w:szCs w:val="${halfPoints}"/>`;
  }
  if (font.highlightColor) {
    xml += `<w:highlight w:val="${escapeXml(font.highlightColor)}"/>`;
  }
  if (font.underline) {
    xml += `<w:u w:val="single"/>`;
  } else if (font.underline === undefined && hyperlink) {
    xml += `<w:u w:val="single"/>`;
  }
  if (shading) {
    xml += `<w:shd w:val="clear" w:color="auto" w:fill="${escapeXml(shading)}"/>`;
  }
  if (font.subscript) {
    xml += `<w:vertAlign w:val="subscript"/>`;
  }
  xml += onOff("rtl", font.rtl);
  xml += onOff("oMath", font.math);
  return xml ? `<w:rPr>${xml}</w:rPr>` : "";
}

function serializeText(text: string, indentStr: string): string {
  let xml = "";
  if (text === "\n") {
    // Line break only
    xml += `${indentStr}  <w:br/>\n`;
  } else if (text.includes("\n")) {
    const parts = text.split("\n");
    for (let i = 0; i < parts.length; i++) {
      if (parts[i]) {
        xml += `${indentStr}  <w:t xml:space="preserve">${escapeXml(parts[i])}</w:t>\n`;
      }
      if (i < parts.length - 1) {
        xml += `${indentStr}  <w:br/>\n`;
      }
    }
  } else if (text) {
    xml += `${indentStr}  <w:t xml:space="preserve">${escapeXml(text)}</w:t>\n`;
  }
  return xml;
}

function serializePicture(run: DocxRun, ctx: SerializeContext): string {
  const picture = run.picture;
  if (!picture) return "";
  const relId = ctx.rels.forMedia(picture.media.name);
  const id = ctx.nextDrawingId++;
  const name = escapeXml(picture.media.name);
  const description = escapeXml(picture.description ?? "");
  const cx = picture.widthEmu;
  const cy = picture.heightEmu;
  return (
    `<w:drawing><wp:inline distT="0" distB="0" distL="0" distR="0">` +
    `<wp:extent cx="${cx}" cy="${cy}"/>` +
    `<wp:docPr id="${id}" name="Picture ${id}" descr="${description}"/>` +
    `<wp:cNvGraphicFramePr><a:graphicFrameLocks noChangeAspect="1"/></wp:cNvGraphicFramePr>` +
    `<a:graphic><a:graphicData uri="${NS_PIC}"><pic:pic>` +
    `<pic:nvPicPr><pic:cNvPr id="${id}" name="${name}"/><pic:cNvPicPr/></pic:nvPicPr>` +
    `<pic:blipFill><a:blip r:embed="${relId}"/><a:stretch><a:fillRect/></a:stretch></pic:blipFill>` +
    `<pic:spPr><a:xfrm><a:off x="0" y="0"/><a:ext cx="${cx}" cy="${cy}"/></a:xfrm>` +
    `<a:prstGeom prst="rect"><a:avLst/></a:prstGeom></pic:spPr>` +
    `</pic:pic></a:graphicData></a:graphic></wp:inline></w:drawing>`
  );
}

function serializeRun(run: DocxRun, indent: number, ctx: SerializeContext): string {
  const indentStr = " ".repeat(indent);
  const isLink = run.hyperlink !== undefined;
  let xml = `${indentStr}<w:r>\n`;

  const properties = serializeRunProperties(run.font, run.shading, isLink);
  if (properties) {
    xml += `${indentStr}  ${properties}\n`;
  }

  if (run.field) {
    xml += `${indentStr}  <w:fldChar w:fldCharType="begin"/>\n`;
    xml += `${indentStr}  <w:instrText xml:space="preserve">${escapeXml(run.field.instruction)}</w:instrText>\n`;
    xml += `${indentStr}  <w:fldChar w:fldCharType="separate"/>\n`;
    xml += `${indentStr}  <w:t>${escapeXml(run.field.placeholder)}</w:t>\n`;
    xml += `${indentStr}  <w:fldChar w:fldCharType="end"/>\n`;
  }

  xml += serializeText(run.text, indentStr);

  if (run.picture) {
    xml += `${indentStr}  ${serializePicture(run, ctx)}\n`;
  }
  if (run.pageBreak) {
    xml += `${indentStr}  <w:br w:type="page"/>\n`;
  }

  xml += `${indentStr}</w:r>\n`;

  if (run.hyperlink !== undefined) {
    const relId = ctx.rels.add(REL_TYPE.hyperlink, run.hyperlink, true);
    return `${indentStr}<w:hyperlink r:id="${relId}">\n${xml}${indentStr}</w:hyperlink>\n`;
  }
  return xml;
}

function serializeParagraph(para: DocxParagraph, indent: number, ctx: SerializeContext): string {
  const indentStr = " ".repeat(indent);
  let xml = `${indentStr}<w:p>\n`;

  const markProperties = para.markFont ? serializeRunProperties(para.markFont) : "";
  const hasProperties = para.style.name !== "Normal" || para.alignment || markProperties;
  if (hasProperties) {
    xml += `${indentStr}  <w:pPr>\n`;
    if (para.style.name !== "Normal") {
      xml += `${indentStr}    <w:pStyle w:val="${escapeXml(para.style.styleId)}"/>\n`;
    }
    if (para.alignment) {
      xml += `${indentStr}    <w:jc w:val="${para.alignment}"/>\n`;
    }
    if (markProperties) {
      xml += `${indentStr}    ${markProperties}\n`;
    }
    xml += `${indentStr}  </w:pPr>\n`;
  }

  for (const run of para.runs) {
    xml += serializeRun(run, indent + 2, ctx);
  }

  xml += `${indentStr}</w:p>\n`;
  return xml;
}

function serializeCellProperties(cell: DocxTableCell): string {
  let xml = "";
  if (cell.width !== undefined) {
    xml += `<w:tcW w:w="${emuToTwips(cell.width)}" w:type="dxa"/>`;
  }
  const edges = Object.entries(cell.borders);
  if (edges.length > 0) {
    xml += "<w:tcBorders>";
    for (const [edge, spec] of edges) {
      if (!spec) continue;
      // attribute order matters to Word
      let attrs = `w:val="${escapeXml(spec.val)}" w:sz="${spec.sz}"`;
      if (spec.space !== undefined) attrs += ` w:space="${spec.space}"`;
      attrs += ` w:color="${escapeXml(spec.color)}"`;
      if (spec.shadow) attrs += ` w:shadow="true"`;
      xml += `<w:${edge} ${attrs}/>`;
    }
    xml += "</w:tcBorders>";
  }
  if (cell.shading) {
    xml += `<w:shd w:val="clear" w:color="auto" w:fill="${escapeXml(cell.shading)}"/>`;
  }
  return `<w:tcPr>${xml}</w:tcPr>`;
}

function serializeTable(table: DocxTable, indent: number, ctx: SerializeContext): string {
  const indentStr = " ".repeat(indent);
  let xml = `${indentStr}<w:tbl>\n`;

  let tblPr = "";
  if (table.style) {
    tblPr += `<w:tblStyle w:val="${escapeXml(table.style.styleId)}"/>`;
  }
  tblPr += `<w:tblW w:w="0" w:type="auto"/>`;
  if (!table.autofit) {
    tblPr += `<w:tblLayout w:type="fixed"/>`;
  }
  xml += `${indentStr}  <w:tblPr>${tblPr}</w:tblPr>\n`;

  const gridCols = table.columnWidths
    .map((width) => (width === undefined ? "<w:gridCol/>" : `<w:gridCol w:w="${emuToTwips(width)}"/>`))
    .join("");
  xml += `${indentStr}  <w:tblGrid>${gridCols}</w:tblGrid>\n`;

  for (const row of table.rows) {
    xml += `${indentStr}  <w:tr>\n`;
    if (row.height !== undefined) {
      xml += `${indentStr}    <w:trPr><w:trHeight w:val="${emuToTwips(row.height)}"/></w:trPr>\n`;
    }

    for (const cell of row.cells) {
      xml += `${indentStr}    <w:tc>\n`;
      xml += `${indentStr}      ${serializeCellProperties(cell)}\n`;
      for (const paragraph of cell.paragraphs) {
        xml += serializeParagraph(paragraph, indent + 6, ctx);
      }
      xml += `${indentStr}    </w:tc>\n`;
    }

    xml += `${indentStr}  </w:tr>\n`;
  }

  xml += `${indentStr}</w:tbl>\n`;
  return xml;
}

function serializeDocumentXml(doc: DocxDocument, rels: RelationshipTable): string {
  const ctx: SerializeContext = { rels, nextDrawingId: 1 };
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += `<w:document xmlns:w="${NS_W}" xmlns:r="${NS_R}" xmlns:wp="${NS_WP}" xmlns:a="${NS_A}" xmlns:pic="${NS_PIC}">\n`;
  xml += "  <w:body>\n";

  for (const block of doc.body) {
    if (block.type === "paragraph") {
      xml += serializeParagraph(block, 4, ctx);
    } else {
      xml += serializeTable(block, 4, ctx);
      // Word merges adjacent tables unless a paragraph sits between them
      xml += "    <w:p/>\n";
    }
  }

  xml += '    <w:sectPr><w:pgSz w:w="11906" w:h="16838"/>';
  xml += '<w:pgMar w:top="1440" w:right="1440" w:bottom="1440" w:left="1440" w:header="708" w:footer="708" w:gutter="0"/></w:sectPr>\n';
  xml += "  </w:body>\n";
  xml += "</w:document>";
  return xml;
}

/**
 * Serializes only word/document.xml. Relationship ids start after the fixed
 * styles and numbering parts, as in the full package.
 */
export function serializeDocumentBody(doc: DocxDocument): string {
  return serializeDocumentXml(doc, new RelationshipTable());
}

function serializeStyle(style: DocxStyle): string {
  let xml = `  <w:style w:type="${style.type}" w:styleId="${escapeXml(style.styleId)}"`;
  xml += style.name === "Normal" ? ' w:default="1">' : ">";
  xml += `<w:name w:val="${escapeXml(style.name)}"/>`;
  if (style.basedOn) {
    xml += `<w:basedOn w:val="${escapeXml(styleIdFor(style.basedOn))}"/>`;
  }
  xml += "<w:qFormat/>";
  if (style.type === "table") {
    xml += "<w:tblPr><w:tblBorders>";
    for (const edge of ["top", "left", "bottom", "right", "insideH", "insideV"]) {
      xml += `<w:${edge} w:val="single" w:sz="4" w:space="0" w:color="auto"/>`;
    }
    xml += '</w:tblBorders><w:tblCellMar><w:left w:w="108" w:type="dxa"/><w:right w:w="108" w:type="dxa"/></w:tblCellMar></w:tblPr>';
  } else {
    let pPr = "";
    if (style.numbering) {
      pPr += `<w:numPr><w:ilvl w:val="${style.numbering.level}"/><w:numId w:val="${style.numbering.numId}"/></w:numPr>`;
    }
    if (/^heading \d$/.test(style.name)) {
      pPr += `<w:keepNext/><w:outlineLvl w:val="${parseInt(style.name.slice(-1), 10) - 1}"/>`;
    }
    if (pPr) {
      xml += `<w:pPr>${pPr}</w:pPr>`;
    }
    xml += serializeRunProperties(style.font);
  }
  xml += "</w:style>\n";
  return xml;
}

export function serializeStylesXml(doc: DocxDocument): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += `<w:styles xmlns:w="${NS_W}">\n`;
  for (const style of doc.styles.all()) {
    xml += serializeStyle(style);
  }
  xml += '  <w:style w:type="character" w:styleId="Hyperlink"><w:name w:val="Hyperlink"/><w:rPr><w:color w:val="0563C1"/><w:u w:val="single"/></w:rPr></w:style>\n';
  xml += "</w:styles>";
  return xml;
}

function serializeNumberingXml(): string {
  const bullets = ["•", "o", "▪"];
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += `<w:numbering xmlns:w="${NS_W}">\n`;
  const abstracts: [number, "bullet" | "decimal"][] = [
    [BULLET_NUMBERING_ID, "bullet"],
    [DECIMAL_NUMBERING_ID, "decimal"],
  ];
  for (const [id, format] of abstracts) {
    xml += `  <w:abstractNum w:abstractNumId="${id}"><w:multiLevelType w:val="hybridMultilevel"/>`;
    for (let level = 0; level < 9; level++) {
      const text = format === "bullet" ? bullets[level % bullets.length] : `%${level + 1}.`;
      xml += `<w:lvl w:ilvl="${level}"><w:start w:val="1"/><w:numFmt w:val="${format}"/>`;
      xml += `<w:lvlText w:val="${escapeXml(text)}"/><w:lvlJc w:val="left"/>`;
      xml += `<w:pPr><w:ind w:left="${720 * (level + 1)}" w:hanging="360"/></w:pPr></w:lvl>`;
    }
    xml += "</w:abstractNum>\n";
  }
  for (const [id] of abstracts) {
    xml += `  <w:num w:numId="${id}"><w:abstractNumId w:val="${id}"/></w:num>\n`;
  }
  xml += "</w:numbering>";
  return xml;
}

function serializeRelationships(entries: Relationship[]): string {
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += `<Relationships xmlns="${NS_PKG_RELS}">\n`;
  for (const rel of entries) {
    const mode = rel.external ? ' TargetMode="External"' : "";
    xml += `  <Relationship Id="${rel.id}" Type="${rel.type}" Target="${escapeXml(rel.target)}"${mode}/>\n`;
  }
  xml += "</Relationships>";
  return xml;
}

function serializeContentTypes(doc: DocxDocument): string {
  const extensions = new Set(doc.media.map((media) => media.extension));
  let xml = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';
  xml += '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">\n';
  xml += '  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>\n';
  xml += '  <Default Extension="xml" ContentType="application/xml"/>\n';
  for (const extension of extensions) {
    const contentType = IMAGE_CONTENT_TYPES[extension] ?? `image/${extension}`;
    xml += `  <Default Extension="${escapeXml(extension)}" ContentType="${contentType}"/>\n`;
  }
  xml += '  <Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>\n';
  xml += '  <Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>\n';
  xml += '  <Override PartName="/word/numbering.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.numbering+xml"/>\n';
  xml += "</Types>";
  return xml;
}

/**
 * Packages the document as a .docx (OOXML zip) buffer.
 */
export async function serializeDocx(doc: DocxDocument): Promise<Buffer> {
  const rels = new RelationshipTable();
  const documentXml = serializeDocumentXml(doc, rels);

  const zip = new JSZip();
  zip.file("[Content_Types].xml", serializeContentTypes(doc));
  zip.file(
    "_rels/.rels",
    serializeRelationships([{ id: "rId1", type: REL_TYPE.officeDocument, target: "word/document.xml", external: false }])
  );
  zip.file("word/document.xml", documentXml);
  zip.file("word/styles.xml", serializeStylesXml(doc));
  zip.file("word/numbering.xml", serializeNumberingXml());
  zip.file("word/_rels/document.xml.rels", serializeRelationships(rels.entries));
  for (const media of doc.media) {
    zip.file(`word/media/${media.name}`, media.data);
  }

  return zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    mimeType: DOCX_CONTENT_TYPE,
  });
}
