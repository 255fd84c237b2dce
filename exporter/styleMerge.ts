import { DocxDocument, DocxFont } from "./docxDocument";
import { ErrorCollector, RenderError, describeError } from "./errors";

/** Font attributes copied from the template, dotted paths for nested ones. */
export const DEFAULT_COPY_ATTRIBUTES: readonly string[] = [
  "italic",
  "math",
  "noProof",
  "webHidden",
  "strike",
  "subscript",
  "rtl",
  "size",
  "color.rgb",
  "shadow",
  "highlightColor",
  "hidden",
  "csBold",
  "name",
];

export interface MergeOptions {
  attributes?: readonly string[];
  errors?: ErrorCollector;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readPath(source: object, path: string[]): unknown {
  let current: unknown = source;
  for (const segment of path) {
    if (!isRecord(current)) {
      throw new TypeError(`Cannot read "${segment}" of ${String(current)}`);
    }
    current = current[segment];
  }
  return current;
}

function writePath(target: object, path: string[], value: unknown): void {
  let current: unknown = target;
  for (const segment of path.slice(0, -1)) {
    if (!isRecord(current)) {
      throw new TypeError(`Cannot read "${segment}" of ${String(current)}`);
    }
    current = current[segment];
  }
  const last = path[path.length - 1];
  if (!isRecord(current) || !Reflect.set(current, last, value)) {
    throw new TypeError(`Cannot set "${last}"`);
  }
}

/**
 * Picks one font per paragraph style name from the template. Every run is
 * visited, so the last run of the last paragraph with that style wins.
 */
export function collectTemplateFonts(template: DocxDocument): Map<string, DocxFont> {
  const fonts = new Map<string, DocxFont>();
  for (const paragraph of template.paragraphs) {
    for (const run of paragraph.runs) {
      fonts.set(paragraph.style.name, run.font);
    }
  }
  return fonts;
}

/**
 * Copies font attributes from the template onto the styles of the produced
 * document's paragraphs with the same style name. Text is never touched.
 * Attributes the template run leaves unset are skipped; a copy that fails is
 * reported and the rest go on.
 */
export function mergeStyles(produced: DocxDocument, template: DocxDocument, options: MergeOptions = {}): DocxDocument {
  const attributes = options.attributes ?? DEFAULT_COPY_ATTRIBUTES;
  const templateFonts = collectTemplateFonts(template);
  let copied = 0;

  for (const paragraph of produced.paragraphs) {
    const sample = templateFonts.get(paragraph.style.name);
    if (!sample) continue;

    for (const attribute of attributes) {
      const path = attribute.split(".");
      try {
        const value = readPath(sample, path);
        if (value === undefined) continue;
        writePath(paragraph.style.font, path, value);
        copied++;
      } catch (error) {
        options.errors?.report(
          new RenderError(
            `Could not copy ${attribute} of style "${paragraph.style.name}": ${describeError(error)}`,
            "attribute",
            undefined,
            error
          )
        );
      }
    }
  }

  console.log(`[styleMerge] Copied ${copied} attributes from ${templateFonts.size} template styles`);
  return produced;
}
