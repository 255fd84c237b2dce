import JSZip from "jszip";
import { describe, expect, it } from "vitest";
import { DocxDocument, createFont } from "./docxDocument";
import { escapeXml, serializeDocumentBody, serializeDocx, serializeRunProperties, serializeStylesXml } from "./docxSerializer";

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &apos;Jerry&apos;&lt;/a&gt;"
    );
  });

  it("drops characters XML cannot carry and keeps tabs", () => {
    expect(escapeXml("a\u0000b\u0001c\u000Bd\u001Fe\uFFFEf\tg")).toBe("abcdef\tg");
  });
});

describe("serializeRunProperties", () => {
  it("writes properties in schema order", () => {
    const font = createFont({ name: "Inter", bold: true, italic: false, size: 10.5, color: { rgb: "404040" } });
    expect(serializeRunProperties(font, "E7E6E6")).toBe(
      '<w:rPr><w:rFonts w:ascii="Inter" w:hAnsi="Inter" w:cs="Inter"/><w:b/><w:i w:val="0"/>' +
        '<w:color w:val="404040"/><w:sz w:val="21"/><w:szCs w:val="21"/>' +
        '<w:shd w:val="clear" w:color="auto" w:fill="E7E6E6"/></w:rPr>'
    );
  });

  it("writes shadow before noProof and noProof before vanish", () => {
    const font = createFont({ shadow: true, noProof: true, hidden: true, strike: false });
    expect(serializeRunProperties(font)).toBe(
      '<w:rPr><w:strike w:val="0"/><w:shadow/><w:noProof/><w:vanish/></w:rPr>'
    );
  });

  it("writes nothing for an empty font", () => {
    expect(serializeRunProperties(createFont())).toBe("");
  });
});

describe("serializeDocumentBody", () => {
  it("writes styled paragraphs", () => {
    const document = new DocxDocument();
    const run = document.addParagraph("heading 1").addRun("Intro & more");
    run.font.bold = true;
    run.font.size = 16;
    run.font.color.rgb = "34AB76";

    const xml = serializeDocumentBody(document);
    expect(xml).toContain('<w:pStyle w:val="Heading1"/>');
    expect(xml).toContain(
      '<w:rPr><w:b/><w:color w:val="34AB76"/><w:sz w:val="32"/><w:szCs w:val="32"/></w:rPr>'
    );
    expect(xml).toContain('<w:t xml:space="preserve">Intro &amp; more</w:t>');
  });

  it("keeps control characters out of run text", () => {
    const document = new DocxDocument();
    document.addParagraph().addRun("bad\u0001char");
    const xml = serializeDocumentBody(document);
    expect(xml).toContain('<w:t xml:space="preserve">badchar</w:t>');
    expect(xml).not.toContain("\u0001");
  });

  it("turns newlines into breaks and keeps page breaks", () => {
    const document = new DocxDocument();
    const paragraph = document.addParagraph();
    paragraph.addRun("one\ntwo");
    paragraph.addRun().addPageBreak();

    const lines = serializeDocumentBody(document).split("\n").map((line) => line.trim());
    const first = lines.indexOf('<w:t xml:space="preserve">one</w:t>');
    expect(lines.slice(first, first + 3)).toEqual([
      '<w:t xml:space="preserve">one</w:t>',
      "<w:br/>",
      '<w:t xml:space="preserve">two</w:t>',
    ]);
    expect(lines).toContain('<w:br w:type="page"/>');
  });

  it("wraps hyperlink runs and numbers relationships after styles and numbering", () => {
    const document = new DocxDocument();
    document.addParagraph().addHyperlinkRun("https://example.com/?a=1&b=2", "site");

    const xml = serializeDocumentBody(document);
    expect(xml).toContain('<w:hyperlink r:id="rId3">');
    expect(xml).toContain('<w:rPr><w:rStyle w:val="Hyperlink"/><w:color w:val="0563C1"/><w:u w:val="single"/></w:rPr>');
  });

  it("writes cell borders and separates tables with an empty paragraph", () => {
    const document = new DocxDocument();
    const table = document.addTable(1, 2);
    table.cell(0, 0).setText("x");
    table.cell(0, 1).setBorder("start", { sz: 12, val: "single", color: "#365FDD" });

    const xml = serializeDocumentBody(document);
    expect(xml).toContain('<w:tcPr><w:tcBorders><w:start w:val="single" w:sz="12" w:color="365FDD"/></w:tcBorders></w:tcPr>');
    expect(xml).toContain("<w:tblPr><w:tblW w:w=\"0\" w:type=\"auto\"/></w:tblPr>");
    expect(xml).toContain("    </w:tbl>\n    <w:p/>\n");
  });
});

describe("serializeStylesXml", () => {
  it("declares the default style and list numbering", () => {
    const document = new DocxDocument();
    document.getOrCreateStyle("List Number 2");
    const xml = serializeStylesXml(document);
    expect(xml).toContain(
      '<w:style w:type="paragraph" w:styleId="Normal" w:default="1"><w:name w:val="Normal"/><w:qFormat/></w:style>'
    );
    expect(xml).toContain('<w:numPr><w:ilvl w:val="1"/><w:numId w:val="2"/></w:numPr>');
  });
});

describe("serializeDocx", () => {
  it("packages document, styles, numbering and media", async () => {
    const document = new DocxDocument();
    const media = document.addMedia(Buffer.from("png-bytes"), "png");
    document.addParagraph().addRun().addPicture(media, 9525, 9525);

    const zip = await JSZip.loadAsync(await serializeDocx(document));
    const files = Object.keys(zip.files).filter((name) => !zip.files[name].dir);
    expect(files.sort()).toEqual([
      "[Content_Types].xml",
      "_rels/.rels",
      "word/_rels/document.xml.rels",
      "word/document.xml",
      "word/media/image1.png",
      "word/numbering.xml",
      "word/styles.xml",
    ]);

    const rels = await zip.file("word/_rels/document.xml.rels")?.async("string");
    expect(rels).toContain(
      '<Relationship Id="rId3" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/image" Target="media/image1.png"/>'
    );
    const types = await zip.file("[Content_Types].xml")?.async("string");
    expect(types).toContain('<Default Extension="png" ContentType="image/png"/>');
    expect(await zip.file("word/media/image1.png")?.async("string")).toBe("png-bytes");
  });
});
