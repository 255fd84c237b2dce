import JSZip from "jszip";
import { XMLParser } from "fast-xml-parser";
import { DocxDocument, DocxFont, createFont } from "./docxDocument";
import { RenderError } from "./errors";

/*
 * Reads a .docx used as a style template. Only what the style merge needs is
 * kept: top-level paragraphs with their style name and the character
 * formatting of their runs, plus the style definitions themselves. Text in
 * tables and hyperlinks is ignored.
 */

type XmlNode = Record<string, unknown>;

const REPEATED_ELEMENTS = new Set(["w:p", "w:r", "w:t", "w:style"]);

function createParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseAttributeValue: false,
    parseTagValue: false,
    isArray: (name) => REPEATED_ELEMENTS.has(name),
  });
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(node: unknown, name: string): unknown {
  return isNode(node) ? node[name] : undefined;
}

function children(node: unknown, name: string): unknown[] {
  const value = child(node, name);
  return Array.isArray(value) ? value : [];
}

function attribute(node: unknown, name: string): string | undefined {
  const value = child(node, `@_${name}`);
  return typeof value === "string" ? value : undefined;
}

/** `<w:b/>` is on, `<w:b w:val="0"/>` is off, a missing element says nothing. */
function toggle(rPr: unknown, name: string): boolean | undefined {
  const element = child(rPr, name);
  if (element === undefined) return undefined;
  const value = attribute(element, "w:val");
  return value === undefined || !["0", "false", "off"].includes(value);
}

function assign<K extends keyof DocxFont>(font: DocxFont, key: K, value: DocxFont[K] | undefined): void {
  if (value !== undefined) font[key] = value;
}

export function parseRunProperties(rPr: unknown): DocxFont {
  const font = createFont();
  if (!isNode(rPr)) return font;

  const fonts = child(rPr, "w:rFonts");
  assign(font, "name", attribute(fonts, "w:ascii") ?? attribute(fonts, "w:hAnsi"));

  const size = parseInt(attribute(child(rPr, "w:sz"), "w:val") ?? "", 10);
  if (!Number.isNaN(size)) {
    font.size = size / 2;
  }

  const color = attribute(child(rPr, "w:color"), "w:val");
  if (color !== undefined && color !== "auto") {
    font.color.rgb = color.toUpperCase();
  }

  assign(font, "highlightColor", attribute(child(rPr, "w:highlight"), "w:val"));
  if (attribute(child(rPr, "w:vertAlign"), "w:val") === "subscript") {
    font.subscript = true;
  }

  const underline = attribute(child(rPr, "w:u"), "w:val");
  if (underline !== undefined) {
    font.underline = underline !== "none";
  }

  assign(font, "bold", toggle(rPr, "w:b"));
  assign(font, "csBold", toggle(rPr, "w:bCs"));
  assign(font, "italic", toggle(rPr, "w:i"));
  assign(font, "strike", toggle(rPr, "w:strike"));
  assign(font, "noProof", toggle(rPr, "w:noProof"));
  assign(font, "shadow", toggle(rPr, "w:shadow"));
  assign(font, "hidden", toggle(rPr, "w:vanish"));
  assign(font, "webHidden", toggle(rPr, "w:webHidden"));
  assign(font, "rtl", toggle(rPr, "w:rtl"));
  assign(font, "math", toggle(rPr, "w:oMath"));
  return font;
}

function runText(run: unknown): string {
  let text = "";
  for (const t of children(run, "w:t")) {
    if (typeof t === "string") {
      text += t;
    } else {
      const content = child(t, "#text");
      text += typeof content === "string" ? content : "";
    }
  }
  if (child(run, "w:br") !== undefined) {
    text += "\n";
  }
  return text;
}

async function readPart(zip: JSZip, path: string): Promise<string | undefined> {
  const file = zip.file(path);
  return file ? file.async("string") : undefined;
}

/**
 * Maps style ids to names and registers every paragraph style with the
 * formatting it declares.
 */
function readStyles(xml: string | undefined, document: DocxDocument): Map<string, string> {
  const names = new Map<string, string>();
  if (!xml) return names;

  const styles = child(createParser().parse(xml), "w:styles");
  for (const style of children(styles, "w:style")) {
    const id = attribute(style, "w:styleId");
    const name = attribute(child(style, "w:name"), "w:val");
    if (!id || !name) continue;
    names.set(id, name);

    if (attribute(style, "w:type") === "paragraph") {
      const target = document.styles.getOrCreate(name);
      const declared = parseRunProperties(child(style, "w:rPr"));
      target.font = { ...target.font, ...declared, color: { ...target.font.color, ...declared.color } };
    }
  }
  return names;
}

export async function readDocxTemplate(buffer: Buffer): Promise<DocxDocument> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    throw new RenderError("Template is not a .docx package", "template", undefined, error);
  }

  const documentXml = await readPart(zip, "word/document.xml");
  if (!documentXml) {
    throw new RenderError("Template has no word/document.xml", "template");
  }

  const template = new DocxDocument();
  const styleNames = readStyles(await readPart(zip, "word/styles.xml"), template);

  const body = child(child(createParser().parse(documentXml), "w:document"), "w:body");
  if (body === undefined) {
    throw new RenderError("Could not find document body", "template");
  }

  for (const p of children(body, "w:p")) {
    const styleId = attribute(child(child(p, "w:pPr"), "w:pStyle"), "w:val");
    const styleName = styleId ? styleNames.get(styleId) ?? styleId : "Normal";
    const paragraph = template.addParagraph(styleName);

    for (const r of children(p, "w:r")) {
      const run = paragraph.addRun(runText(r));
      run.font = parseRunProperties(child(r, "w:rPr"));
    }
  }

  console.log(
    `[docxExtractor] Template read: ${template.paragraphs.length} paragraphs, ${styleNames.size} styles`
  );
  return template;
}
