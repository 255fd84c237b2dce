import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "./config";
import { DOCX_CONTENT_TYPE } from "./docxSerializer";
import { deleteImage, exportKey, saveToObjectStore, uploadImage } from "./objectStore";
import { FakeObjectStore } from "./testSupport";

const config = loadConfig({ EXPORT_BUCKET: "exports", CDN_URL: "https://cdn.example.com/" });

describe("saveToObjectStore", () => {
  it("stores the document under export/<shelf>/<user>/ and returns a presigned link", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const store = new FakeObjectStore();
    const url = await saveToObjectStore(store, config, Buffer.from("docx"), "42", "7", "handbook.docx");

    expect(exportKey("42", "7", "handbook.docx")).toBe("export/42/7/handbook.docx");
    expect(url).toBe("https://exports.s3.amazonaws.com/export/42/7/handbook.docx?X-Amz-Expires=900");
    expect(store.objects.get("exports/export/42/7/handbook.docx")).toEqual({
      body: Buffer.from("docx"),
      contentType: DOCX_CONTENT_TYPE,
      acl: undefined,
    });
  });

  it("fails without a bucket", async () => {
    await expect(
      saveToObjectStore(new FakeObjectStore(), loadConfig({}), Buffer.from("docx"), "1", "2", "a.docx")
    ).rejects.toThrow("No export bucket configured (EXPORT_BUCKET)");
  });

  it("propagates upload failures", async () => {
    const store = new FakeObjectStore();
    vi.spyOn(store, "put").mockRejectedValue(new Error("access denied"));
    await expect(saveToObjectStore(store, config, Buffer.from("docx"), "1", "2", "a.docx")).rejects.toThrow(
      "access denied"
    );
  });
});

describe("uploadImage and deleteImage", () => {
  it("publishes images through the CDN and removes them again", async () => {
    const store = new FakeObjectStore();
    const url = await uploadImage(store, config, "logo.png", Buffer.from("png"), "image/png");

    expect(url).toBe("https://cdn.example.com/export/logo.png");
    expect(store.objects.get("exports/export/logo.png")?.acl).toBe("public-read");

    await deleteImage(store, config, url);
    expect(store.objects.size).toBe(0);
  });

  it("returns the bucket url when no CDN is configured", async () => {
    const store = new FakeObjectStore();
    const plain = loadConfig({ EXPORT_BUCKET: "exports" });
    expect(await uploadImage(store, plain, "a.jpg", Buffer.from("jpg"), "image/jpeg")).toBe(
      "https://exports.s3.amazonaws.com/export/a.jpg"
    );
  });

  it("refuses to delete images served from elsewhere", async () => {
    await expect(deleteImage(new FakeObjectStore(), config, "https://other.example.com/export/a.png")).rejects.toThrow(
      "https://other.example.com/export/a.png is not served from https://cdn.example.com"
    );
  });
});
