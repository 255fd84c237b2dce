import { ErrorCollector, RenderError, describeError } from "./errors";
import { Block } from "./types";

export interface ResolvedSnippet {
  /** Blocks of the article the snippet was cut from, in document order. */
  sourceBlocks: Block[];
  includedKeys: Set<string>;
}

export interface SnippetResolver {
  resolveSnippet(snippetId: string): Promise<ResolvedSnippet>;
}

export interface SnippetRecord {
  articleId: string;
  blockKeys: string[];
}

/**
 * Resolver over snippet and article records already in memory, for callers
 * that load them up front.
 */
export class InMemorySnippetResolver implements SnippetResolver {
  constructor(
    private readonly snippets: Map<string, SnippetRecord>,
    private readonly articleBlocks: Map<string, Block[]>
  ) {}

  async resolveSnippet(snippetId: string): Promise<ResolvedSnippet> {
    const snippet = this.snippets.get(snippetId);
    if (!snippet) {
      throw new RenderError(`Snippet ${snippetId} does not exist`, "external-service");
    }
    const sourceBlocks = this.articleBlocks.get(snippet.articleId);
    if (!sourceBlocks) {
      throw new RenderError(`Article ${snippet.articleId} of snippet ${snippetId} does not exist`, "external-service");
    }
    return { sourceBlocks, includedKeys: new Set(snippet.blockKeys) };
  }
}

/**
 * Replaces every `snippet` block with the blocks it refers to. A snippet that
 * cannot be resolved contributes nothing. Without a resolver, snippet blocks
 * are left in place for the dispatcher.
 */
export async function expandSnippets(
  blocks: Block[],
  resolver: SnippetResolver | undefined,
  errors: ErrorCollector
): Promise<Block[]> {
  if (!resolver) return blocks.slice();

  const expanded: Block[] = [];
  for (const block of blocks) {
    if (block.type !== "snippet") {
      expanded.push(block);
      continue;
    }
    const snippetId = block.data.src;
    try {
      if (!snippetId) {
        throw new RenderError("Snippet block has no source id", "external-service");
      }
      const { sourceBlocks, includedKeys } = await resolver.resolveSnippet(String(snippetId));
      expanded.push(...sourceBlocks.filter((source) => includedKeys.has(source.key)));
    } catch (error) {
      errors.report(
        error instanceof RenderError
          ? RenderError.fromBlock(block.key, error)
          : new RenderError(`Snippet lookup failed: ${describeError(error)}`, "external-service", block.key, error)
      );
    }
  }
  return expanded;
}
