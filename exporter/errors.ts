export type RenderErrorKind = "block" | "attribute" | "image-format" | "external-service" | "template";

export class RenderError extends Error {
  constructor(
    message: string,
    public readonly kind: RenderErrorKind,
    public readonly blockKey?: string,
    public readonly reason?: unknown
  ) {
    super(message);
    this.name = "RenderError";
  }

  /**
   * Wraps whatever a handler threw. A RenderError raised deeper keeps its kind
   * and only gains the block key.
   */
  static fromBlock(blockKey: string, error: unknown): RenderError {
    if (error instanceof RenderError) {
      return error.blockKey !== undefined
        ? error
        : new RenderError(error.message, error.kind, blockKey, error.reason);
    }
    return new RenderError(describeError(error), "block", blockKey, error);
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: RenderError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: RenderError): Result<T> {
  return { ok: false, error };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keeps every error the render recovered from. Nothing is thrown from here;
 * the caller decides whether a non-empty collector matters.
 */
export class ErrorCollector {
  private readonly collected: RenderError[] = [];

  constructor(private readonly scope: string = "docxExporter") {}

  report(error: RenderError): void {
    this.collected.push(error);
    const where = error.blockKey ? ` (block ${error.blockKey})` : "";
    console.error(`[${this.scope}] ${error.kind} error${where}: ${error.message}`);
  }

  get errors(): readonly RenderError[] {
    return this.collected;
  }

  get count(): number {
    return this.collected.length;
  }

  ofKind(kind: RenderErrorKind): RenderError[] {
    return this.collected.filter((error) => error.kind === kind);
  }
}
