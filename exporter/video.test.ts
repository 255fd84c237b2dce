import { describe, expect, it } from "vitest";
import { FakeBlobFetcher } from "./testSupport";
import { detectProvider, resolveThumbnails, vimeoVideoId, youtubeVideoId } from "./video";

describe("youtubeVideoId", () => {
  it.each([
    ["https://youtu.be/abc123XYZ", "abc123XYZ"],
    ["https://www.youtube.com/watch?v=abc123XYZ&t=10", "abc123XYZ"],
    ["https://youtube.com/embed/abc123XYZ", "abc123XYZ"],
    ["https://www.youtube.com/v/abc123XYZ", "abc123XYZ"],
  ])("reads the id from %s", (url, id) => {
    expect(youtubeVideoId(url)).toBe(id);
  });

  it("returns undefined for other shapes", () => {
    expect(youtubeVideoId("https://www.youtube.com/channel/xyz")).toBeUndefined();
    expect(youtubeVideoId("not a url")).toBeUndefined();
  });
});

describe("vimeoVideoId", () => {
  it("reads ids from page, player and channel urls", () => {
    expect(vimeoVideoId("https://vimeo.com/76979871")).toBe("76979871");
    expect(vimeoVideoId("https://player.vimeo.com/video/76979871?h=1")).toBe("76979871");
    expect(vimeoVideoId("https://vimeo.com/channels/staffpicks/76979871")).toBe("76979871");
    expect(vimeoVideoId("https://vimeo.com/album/2222/video/76979871")).toBe("76979871");
    expect(vimeoVideoId("https://vimeo.com/about")).toBeUndefined();
  });
});

describe("resolveThumbnails", () => {
  it("builds YouTube thumbnail urls without a request", async () => {
    const fetcher = new FakeBlobFetcher();
    const thumbnails = await resolveThumbnails("https://youtu.be/abc123XYZ", fetcher);
    expect(thumbnails?.big).toBe("https://img.youtube.com/vi/abc123XYZ/sddefault.jpg");
    expect(fetcher.requested).toEqual([]);
  });

  it("asks Vimeo for the thumbnails", async () => {
    const fetcher = new FakeBlobFetcher().addJson("http://vimeo.com/api/v2/video/76979871.json", [
      { thumbnail_small: "s.jpg", thumbnail_medium: "m.jpg", thumbnail_large: "l.jpg" },
    ]);
    expect(await resolveThumbnails("https://vimeo.com/76979871", fetcher)).toEqual({
      small: "s.jpg",
      normal: "m.jpg",
      big: "l.jpg",
    });
  });

  it("fails with an external-service error when Vimeo has nothing", async () => {
    const fetcher = new FakeBlobFetcher().addJson("http://vimeo.com/api/v2/video/1.json", []);
    await expect(resolveThumbnails("https://vimeo.com/1", fetcher)).rejects.toMatchObject({
      kind: "external-service",
    });
  });

  it("skips unknown providers", async () => {
    expect(detectProvider("https://example.com/clip.mp4")).toBeUndefined();
    expect(await resolveThumbnails("https://example.com/clip.mp4", new FakeBlobFetcher())).toBeUndefined();
  });
});
