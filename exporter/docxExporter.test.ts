import JSZip from "jszip";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { DocxDocument, createFont } from "./docxDocument";
import { DocxExporter, renderArticleBlocks, renderShelf } from "./docxExporter";
import { serializeDocx } from "./docxSerializer";
import { ErrorCollector } from "./errors";
import { InMemorySnippetResolver } from "./snippetResolver";
import { FakeBlobFetcher, FakeImageCodec } from "./testSupport";
import { Article, Block, Shelf, createBlock } from "./types";

function article(name: string, blocks: Block[], overrides: Partial<Article> = {}): Article {
  return { name, description: `About ${name}`, docVersion: 3, entityMap: {}, blocks, ...overrides };
}

function shelfOf(...articles: Article[]): Shelf {
  return { id: "1", name: "Handbook", requestUserId: "2", books: [{ name: "Basics", articles }] };
}

function fakes() {
  return { fetcher: new FakeBlobFetcher(), codec: new FakeImageCodec() };
}

const introBlocks = (): Block[] => [
  createBlock({ key: "h", type: "header-two", text: "Intro" }),
  createBlock({
    key: "p",
    type: "unstyled",
    text: "Hello",
    inlineStyleRanges: [{ style: "BOLD", offset: 0, length: 5 }],
  }),
];

describe("DocxExporter", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("lays out title, book, article header and blocks", async () => {
    const report = await new DocxExporter(shelfOf(article("Welcome", introBlocks())), fakes()).export();

    expect(report.blocksDispatched).toBe(3);
    expect(report.errors).toEqual([]);
    expect(report.document.paragraphs.map((paragraph) => [paragraph.style.name, paragraph.text])).toEqual([
      ["Normal", "Handbook"],
      ["Normal", "Basics"],
      ["Normal", ""],
      ["Normal", "\nWelcome"],
      ["Normal", "About Welcome"],
      ["Normal", ""],
      ["heading 1", "Intro"],
      ["Normal", "Hello"],
      ["Normal", ""],
    ]);

    const [title, book, , name] = report.document.paragraphs;
    expect(title.runs[0].font).toEqual({ name: "Inter", size: 28, color: { rgb: "34AB76" }, bold: true });
    expect(book.runs[0].font.size).toBe(24);
    expect(name.alignment).toBe("center");
    expect(name.runs[1].font.size).toBe(18);
    expect(report.document.paragraphs[5].markFont).toEqual({ name: "Inter", size: 13, color: { rgb: "404040" } });

    const hello = report.document.paragraphs[7].runs;
    expect(hello).toHaveLength(1);
    expect(hello[0].font.bold).toBe(true);
  });

  it("ends every article with a page break", async () => {
    const report = await new DocxExporter(
      shelfOf(article("One", introBlocks()), article("Two", [])),
      fakes()
    ).export();

    const breaks = report.document.paragraphs.flatMap((paragraph) => paragraph.runs).filter((run) => run.pageBreak);
    expect(breaks).toHaveLength(2);
    expect(report.blocksDispatched).toBe(4);
  });

  it("adds a table of contents field on request", async () => {
    const report = await new DocxExporter(shelfOf(), { ...fakes(), includeTableOfContents: true }).export();
    const field = report.document.paragraphs[2].runs[0].field;
    expect(field?.instruction).toBe('TOC \\o "1-3" \\h \\z \\u');
  });

  it("skips failing blocks and keeps going", async () => {
    const errors = new ErrorCollector("test");
    const blocks = [
      createBlock({ key: "f", type: "figure", data: { src: "https://img.example.com/missing.png" } }),
      createBlock({ key: "after", type: "unstyled", text: "still here" }),
    ];
    const report = await new DocxExporter(shelfOf(article("Broken", blocks)), { ...fakes(), errors }).export();

    expect(report.blocksDispatched).toBe(3);
    expect(errors.errors.map((error) => [error.kind, error.blockKey])).toEqual([["external-service", "f"]]);
    expect(report.document.paragraphs.map((paragraph) => paragraph.text)).toContain("still here");
    expect(console.warn).toHaveBeenCalledWith("[docxExporter] Skipped figure#f (empty)");
  });

  it("reports an article icon that cannot be loaded", async () => {
    const report = await new DocxExporter(
      shelfOf(article("Icons", [], { meta: { icon: "https://img.example.com/icon.png" } })),
      fakes()
    ).export();

    expect(report.errors.map((error) => error.blockKey)).toEqual(["Icons:icon"]);
  });

  it("expands snippets before rendering", async () => {
    const snippets = new InMemorySnippetResolver(
      new Map([["s1", { articleId: "a9", blockKeys: ["k2"] }]]),
      new Map([
        [
          "a9",
          [
            createBlock({ key: "k1", type: "unstyled", text: "not shared" }),
            createBlock({ key: "k2", type: "unstyled", text: "shared text" }),
          ],
        ],
      ])
    );
    const blocks = [createBlock({ key: "s", type: "snippet", data: { src: "s1" } })];
    const report = await new DocxExporter(shelfOf(article("Reuse", blocks)), { ...fakes(), snippets }).export();

    const texts = report.document.paragraphs.map((paragraph) => paragraph.text);
    expect(texts).toContain("shared text");
    expect(texts).not.toContain("not shared");
  });

  it("copies template styles onto the result", async () => {
    const template = new DocxDocument();
    template.addParagraph("heading 1").addRun("Sample").font = createFont({ italic: true, size: 20 });

    for (const source of [template, await serializeDocx(template)]) {
      const report = await new DocxExporter(shelfOf(article("Styled", introBlocks())), {
        ...fakes(),
        template: source,
      }).export();

      const heading = report.document.styles.get("heading 1");
      expect(heading?.font).toEqual({ name: "Inter", color: { rgb: "404040" }, bold: true, italic: true, size: 20 });
      expect(report.document.paragraphs[6].text).toBe("Intro");
    }
  });
});

describe("renderArticleBlocks", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("rewrites legacy three-column cell depths before dispatch", async () => {
    const document = new DocxDocument();
    const blocks = [
      createBlock({ key: "a", type: "cell", text: "a", depth: 1 }),
      createBlock({ key: "b", type: "cell", text: "b", depth: 1 }),
      createBlock({ key: "c", type: "cell", text: "c", depth: 2 }),
    ];
    const result = await renderArticleBlocks(document, blocks, {
      docVersion: 2,
      entityMap: {},
      services: { ...fakes(), errors: new ErrorCollector("test") },
    });

    expect(result.dispatched).toBe(4);
    expect(document.tables.map((table) => table.toMatrix())).toEqual([[["a", "b", "c"]]]);
    expect(blocks[0].depth).toBe(1);
    expect(result.paragraph?.text).toBe("");
  });
});

describe("renderShelf", () => {
  it("produces a .docx package", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const buffer = await renderShelf(shelfOf(article("Welcome", introBlocks())), undefined, fakes());

    const zip = await JSZip.loadAsync(buffer);
    const xml = await zip.file("word/document.xml")?.async("string");
    expect(xml).toContain('<w:t xml:space="preserve">Handbook</w:t>');
    expect(xml).toContain('<w:br w:type="page"/>');
  });
});
