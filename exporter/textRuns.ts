import { DocxParagraph, DocxRun } from "./docxDocument";
import { ErrorCollector, RenderError, describeError } from "./errors";
import { DEFAULT_RUN_FORMAT, IMAGE_MARKER, InlineImage, RunFormat, resolveStyle } from "./styleResolver";
import { EntityMap, EntityRange, InlineStyleRange } from "./types";

export interface RunDescriptor {
  text: string;
  format: RunFormat;
  link?: string;
  image?: InlineImage;
}

export type ImageInserter = (run: DocxRun, image: InlineImage) => Promise<void>;

/**
 * Turns LINK and IMG entity ranges into style ranges. Entities of any other
 * type, or missing from the map, are dropped.
 */
export function foldEntityRanges(entityRanges: EntityRange[], entityMap: EntityMap): InlineStyleRange[] {
  const folded: InlineStyleRange[] = [];
  for (const range of entityRanges) {
    const entity = entityMap[String(range.key)];
    if (!entity || !entity.type) continue;

    if (entity.type === "LINK" && typeof entity.data.href === "string") {
      folded.push({ style: { link: entity.data.href }, offset: range.offset, length: range.length });
    } else if (entity.type === "IMG") {
      folded.push({ style: { img: entity }, offset: range.offset, length: range.length });
    }
  }
  return folded;
}

/** Stable: ranges sharing an offset keep their relative order. */
export function sortStyleRanges(ranges: InlineStyleRange[]): InlineStyleRange[] {
  return [...ranges].sort((a, b) => a.offset - b.offset);
}

function applyRange(descriptor: RunDescriptor, range: InlineStyleRange): void {
  const instruction = resolveStyle(range.style);
  switch (instruction.kind) {
    case "format":
      Object.assign(descriptor.format, instruction.patch);
      break;
    case "link":
      descriptor.link = instruction.href;
      break;
    case "image":
      descriptor.text = descriptor.text.replace(IMAGE_MARKER, "");
      descriptor.image = instruction.image;
      break;
    case "none":
      break;
  }
}

/**
 * Produces one run descriptor per character of `text` (code points, so the
 * image marker counts once). Later ranges overwrite earlier ones on scalar
 * attributes.
 */
export function buildRuns(
  text: string,
  inlineStyleRanges: InlineStyleRange[],
  entityRanges: EntityRange[],
  entityMap: EntityMap,
  errors?: ErrorCollector
): RunDescriptor[] {
  const ranges = sortStyleRanges([...inlineStyleRanges, ...foldEntityRanges(entityRanges, entityMap)]);
  const runs: RunDescriptor[] = Array.from(text, (char) => ({ text: char, format: { ...DEFAULT_RUN_FORMAT } }));

  for (const range of ranges) {
    const end = range.offset + range.length;
    for (let index = Math.max(range.offset, 0); index < end && index < runs.length; index++) {
      const run = runs[index];
      try {
        applyRange(run, range);
      } catch (error) {
        runs[index] = { text: run.text, format: { ...DEFAULT_RUN_FORMAT } };
        errors?.report(new RenderError(`Could not style character ${index}: ${describeError(error)}`, "attribute", undefined, error));
      }
    }
  }

  return runs;
}

function sameFormat(a: RunFormat, b: RunFormat): boolean {
  return (
    a.fontName === b.fontName &&
    a.size === b.size &&
    a.color === b.color &&
    !!a.bold === !!b.bold &&
    !!a.italic === !!b.italic &&
    !!a.underline === !!b.underline &&
    a.shading === b.shading
  );
}

/**
 * Joins neighbouring descriptors that would produce identical runs. Image
 * descriptors always stay on their own.
 */
export function coalesceRuns(runs: RunDescriptor[]): RunDescriptor[] {
  const merged: RunDescriptor[] = [];
  for (const run of runs) {
    const last = merged[merged.length - 1];
    if (last && !last.image && !run.image && last.link === run.link && sameFormat(last.format, run.format)) {
      last.text += run.text;
    } else {
      merged.push({ ...run, format: { ...run.format } });
    }
  }
  return merged;
}

export function applyRunFormat(run: DocxRun, format: RunFormat): void {
  run.font.name = format.fontName;
  run.font.size = format.size;
  run.font.color.rgb = format.color;
  if (format.bold !== undefined) run.font.bold = format.bold;
  if (format.italic !== undefined) run.font.italic = format.italic;
  if (format.underline !== undefined) run.font.underline = format.underline;
  if (format.shading !== undefined) run.shading = format.shading;
}

/**
 * Writes descriptors into a paragraph, one sink run per coalesced group.
 */
export async function writeRuns(
  paragraph: DocxParagraph,
  runs: RunDescriptor[],
  insertImage?: ImageInserter
): Promise<DocxRun[]> {
  const written: DocxRun[] = [];
  for (const group of coalesceRuns(runs)) {
    const run = group.link !== undefined ? paragraph.addHyperlinkRun(group.link, group.text) : paragraph.addRun(group.text);
    applyRunFormat(run, group.format);
    if (group.image && insertImage) {
      await insertImage(run, group.image);
    }
    written.push(run);
  }
  return written;
}
