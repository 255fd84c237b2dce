import { RenderError, describeError } from "./errors";

export interface FetchedBlob {
  data: Buffer;
  contentType: string | null;
}

export interface BlobFetcher {
  get(url: string): Promise<FetchedBlob>;
  getJson(url: string): Promise<unknown>;
}

/**
 * Plain HTTP(S) fetcher. No retries: a failed request surfaces as an
 * external-service error and the element that needed it is skipped.
 */
export class HttpBlobFetcher implements BlobFetcher {
  constructor(private readonly timeoutMs: number = 15000) {}

  async get(url: string): Promise<FetchedBlob> {
    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new RenderError(`Request to ${url} failed: ${describeError(error)}`, "external-service", undefined, error);
    }
    if (!response.ok) {
      throw new RenderError(`Request to ${url} returned ${response.status}`, "external-service");
    }
    return {
      data: Buffer.from(await response.arrayBuffer()),
      contentType: response.headers.get("content-type"),
    };
  }

  async getJson(url: string): Promise<unknown> {
    const { data } = await this.get(url);
    try {
      return JSON.parse(data.toString("utf8"));
    } catch (error) {
      throw new RenderError(`Response from ${url} is not JSON`, "external-service", undefined, error);
    }
  }
}
