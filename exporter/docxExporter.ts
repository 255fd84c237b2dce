import { BlobFetcher, HttpBlobFetcher } from "./blobFetcher";
import {
  FONT_COLOR,
  FONT_NAME,
  HEADER_COLOR,
  RenderServices,
  RenderState,
  addParagraph,
  describeBlock,
  dispatchBlock,
  placePicture,
} from "./blockDispatcher";
import { DocxDocument, DocxParagraph, createFont } from "./docxDocument";
import { readDocxTemplate } from "./docxExtractor";
import { serializeDocx } from "./docxSerializer";
import { ErrorCollector, RenderError } from "./errors";
import { ImageCodec, JimpImageCodec } from "./imageCodec";
import { SnippetResolver, expandSnippets } from "./snippetResolver";
import { mergeStyles } from "./styleMerge";
import { createStructuralContext, normalizeCellDepths } from "./structureTracker";
import { Article, Block, Book, EntityMap, Shelf, createBlock } from "./types";

/** Documents at or below this version encode table columns in cell depth. */
export const LEGACY_DOC_VERSION = 2;

export interface ExportOptions {
  /** Document whose paragraph styles are copied onto the result. */
  template?: DocxDocument | Buffer;
  fetcher?: BlobFetcher;
  codec?: ImageCodec;
  snippets?: SnippetResolver;
  errors?: ErrorCollector;
  includeTableOfContents?: boolean;
}

export interface ArticleRenderOptions {
  docVersion: number;
  entityMap: EntityMap;
  services: RenderServices;
  /** Paragraph left open by whatever was rendered before the article. */
  paragraph?: DocxParagraph | null;
}

export interface ArticleRenderResult {
  paragraph: DocxParagraph | null;
  /** Number of dispatch calls, synthetic terminal block included. */
  dispatched: number;
}

export interface ExportReport {
  document: DocxDocument;
  blocksDispatched: number;
  errors: readonly RenderError[];
}

/**
 * Drives the dispatcher over one article's block list. Structural state
 * starts fresh here and is dropped when the article ends.
 */
export async function renderArticleBlocks(
  document: DocxDocument,
  blocks: Block[],
  options: ArticleRenderOptions
): Promise<ArticleRenderResult> {
  const prepared = options.docVersion <= LEGACY_DOC_VERSION ? normalizeCellDepths(blocks) : blocks.slice();
  // an empty trailing paragraph closes any table or dictionary still open
  prepared.push(createBlock({ type: "unstyled", key: "__terminal__" }));

  const state: RenderState = {
    document,
    paragraph: options.paragraph ?? null,
    blocks: prepared,
    index: 0,
    docVersion: options.docVersion,
    entityMap: options.entityMap,
    context: createStructuralContext(),
    services: options.services,
  };

  let dispatched = 0;
  for (let index = 0; index < prepared.length; index++) {
    state.index = index;
    const result = await dispatchBlock(state, prepared[index]);
    dispatched++;
    if (!result.ok) {
      options.services.errors.report(result.error);
      console.warn(`[docxExporter] Skipped ${describeBlock(prepared[index])}`);
    }
  }

  return { paragraph: state.paragraph, dispatched };
}

export class DocxExporter {
  readonly document = new DocxDocument();
  private readonly services: RenderServices;
  private readonly snippets?: SnippetResolver;
  private paragraph: DocxParagraph | null = null;
  private dispatched = 0;

  constructor(private readonly shelf: Shelf, private readonly options: ExportOptions = {}) {
    this.services = {
      fetcher: options.fetcher ?? new HttpBlobFetcher(),
      codec: options.codec ?? new JimpImageCodec(),
      errors: options.errors ?? new ErrorCollector(),
    };
    this.snippets = options.snippets;
  }

  private get state(): RenderState {
    return {
      document: this.document,
      paragraph: this.paragraph,
      blocks: [],
      index: 0,
      docVersion: LEGACY_DOC_VERSION + 1,
      entityMap: {},
      context: createStructuralContext(),
      services: this.services,
    };
  }

  private newParagraph(styleName = "Normal"): DocxParagraph {
    const state = this.state;
    this.paragraph = addParagraph(state, styleName);
    return this.paragraph;
  }

  /**
   * Builds the document. Errors inside a block, picture or style copy are
   * collected and rendering goes on; the report lists them.
   */
  async export(): Promise<ExportReport> {
    console.log(`[docxExporter] Exporting shelf "${this.shelf.name}" (${this.shelf.books.length} books)`);
    this.addTitlePage(this.shelf.name);
    if (this.options.includeTableOfContents) {
      this.addTableOfContents();
    }

    for (const book of this.shelf.books) {
      await this.addBook(book);
    }

    if (this.options.template) {
      const template = Buffer.isBuffer(this.options.template)
        ? await readDocxTemplate(this.options.template)
        : this.options.template;
      mergeStyles(this.document, template, { errors: this.services.errors });
    }

    console.log(
      `[docxExporter] Done: ${this.dispatched} blocks dispatched, ${this.services.errors.count} errors recovered`
    );
    return { document: this.document, blocksDispatched: this.dispatched, errors: this.services.errors.errors };
  }

  /** Builds and serializes in one go. */
  async render(): Promise<Buffer> {
    await this.export();
    return serializeDocx(this.document);
  }

  private addTitlePage(shelfName: string): void {
    const run = this.newParagraph().addRun(shelfName);
    run.font.name = FONT_NAME;
    run.font.size = 28;
    run.font.color.rgb = HEADER_COLOR;
    run.font.bold = true;
    this.newParagraph();
  }

  private addTableOfContents(): void {
    const paragraph = this.newParagraph();
    paragraph.addRun().field = {
      instruction: 'TOC \\o "1-3" \\h \\z \\u',
      placeholder: "Right-click to update field.",
    };
    paragraph.addRun("\nUpdate the Table of Contents to see the new contents of document ⬆️");
  }

  private addBookTitle(name: string): void {
    const paragraph = this.paragraph ?? this.newParagraph();
    const run = paragraph.addRun(name);
    run.font.name = FONT_NAME;
    run.font.size = 24;
    run.font.color.rgb = FONT_COLOR;
    run.font.bold = true;
  }

  private async addBook(book: Book): Promise<void> {
    console.log(`[docxExporter] Book "${book.name}": ${book.articles.length} articles`);
    this.addBookTitle(book.name);
    for (const article of book.articles) {
      await this.addArticle(article);
    }
  }

  private async addArticleHeader(article: Article): Promise<void> {
    this.newParagraph();
    if (article.meta?.icon) {
      const state = this.state;
      try {
        await placePicture(state, article.meta.icon, { alignment: "center" });
      } catch (error) {
        this.services.errors.report(RenderError.fromBlock(`${article.name}:icon`, error));
      }
      this.paragraph = state.paragraph;
    }

    const title = this.newParagraph();
    title.addRun("\n");
    const name = title.addRun(article.name);
    name.font.size = 18;
    name.font.name = FONT_NAME;
    name.font.color.rgb = FONT_COLOR;
    name.font.bold = true;
    title.alignment = "center";

    const subtitle = this.newParagraph();
    const description = subtitle.addRun(article.description ?? "");
    description.font.size = 12;
    description.font.name = FONT_NAME;
    description.font.color.rgb = FONT_COLOR;
    description.font.bold = true;
    subtitle.alignment = "center";

    this.newParagraph().markFont = createFont({ name: FONT_NAME, size: 13, color: { rgb: FONT_COLOR } });
  }

  private async addArticle(article: Article): Promise<void> {
    const blocks = await expandSnippets(article.blocks, this.snippets, this.services.errors);
    await this.addArticleHeader(article);

    const result = await renderArticleBlocks(this.document, blocks, {
      docVersion: article.docVersion,
      entityMap: article.entityMap,
      services: this.services,
      paragraph: this.paragraph,
    });
    this.dispatched += result.dispatched;
    this.paragraph = result.paragraph ?? this.newParagraph();
    this.paragraph.addRun().addPageBreak();
  }
}

/**
 * Renders a shelf to .docx bytes.
 */
export async function renderShelf(
  shelf: Shelf,
  template?: DocxDocument | Buffer,
  options: Omit<ExportOptions, "template"> = {}
): Promise<Buffer> {
  return new DocxExporter(shelf, { ...options, template }).render();
}
