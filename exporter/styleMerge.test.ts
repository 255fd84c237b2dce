import { beforeEach, describe, expect, it, vi } from "vitest";
import { DocxDocument, DocxFont, createFont } from "./docxDocument";
import { ErrorCollector } from "./errors";
import { DEFAULT_COPY_ATTRIBUTES, collectTemplateFonts, mergeStyles } from "./styleMerge";

function templateWith(...paragraphs: [string, DocxFont][]): DocxDocument {
  const template = new DocxDocument();
  for (const [style, font] of paragraphs) {
    template.addParagraph(style).addRun("sample").font = font;
  }
  return template;
}

describe("mergeStyles", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("copies font attributes onto styles with the same name", () => {
    const produced = new DocxDocument();
    produced.addParagraph("heading 1").addRun("Intro");
    const template = templateWith([
      "heading 1",
      createFont({ italic: true, size: 20, name: "Georgia", highlightColor: "yellow", color: { rgb: "FF0000" } }),
    ]);

    mergeStyles(produced, template);

    const style = produced.paragraphs[0].style;
    expect(style.font).toEqual({
      bold: true,
      italic: true,
      size: 20,
      name: "Georgia",
      highlightColor: "yellow",
      color: { rgb: "FF0000" },
    });
    expect(produced.paragraphs[0].text).toBe("Intro");
  });

  it("uses the last run seen for a style", () => {
    const template = templateWith(
      ["Normal", createFont({ size: 9, italic: true })],
      ["Normal", createFont({ size: 11 })]
    );
    expect(collectTemplateFonts(template).get("Normal")).toEqual({ size: 11, color: {} });

    const produced = new DocxDocument();
    produced.addParagraph().addRun("text");
    mergeStyles(produced, template);
    expect(produced.paragraphs[0].style.font).toEqual({ size: 11, color: {} });
  });

  it("leaves styles the template does not have", () => {
    const produced = new DocxDocument();
    produced.addParagraph("Caption").addRun("caption");
    mergeStyles(produced, templateWith(["Normal", createFont({ size: 30 })]));
    expect(produced.paragraphs[0].style.font).toEqual({ color: {} });
  });

  it("copies only the requested attributes", () => {
    const produced = new DocxDocument();
    produced.addParagraph().addRun("text");
    const template = templateWith(["Normal", createFont({ size: 30, italic: true })]);
    mergeStyles(produced, template, { attributes: ["italic"] });
    expect(produced.paragraphs[0].style.font).toEqual({ italic: true, color: {} });
  });

  it("skips an attribute that cannot be copied and carries on", () => {
    const errors = new ErrorCollector("test");
    const produced = new DocxDocument();
    produced.addParagraph().addRun("text");
    const template = templateWith(["Normal", createFont({ size: 14, italic: true, color: { rgb: "00FF00" } })]);

    mergeStyles(produced, template, { attributes: ["size", "color.rgb.value", "italic"], errors });

    expect(produced.paragraphs[0].style.font).toEqual({ size: 14, italic: true, color: {} });
    expect(errors.count).toBe(1);
    expect(errors.errors[0].kind).toBe("attribute");
    expect(errors.errors[0].message).toBe('Could not copy color.rgb.value of style "Normal": Cannot read "value" of 00FF00');
  });

  it("copies the documented attribute set by default", () => {
    expect(DEFAULT_COPY_ATTRIBUTES).toContain("color.rgb");
    expect(DEFAULT_COPY_ATTRIBUTES).toHaveLength(14);
  });
});
