/**
 * Grammar engine adapter.
 *
 * The extractor only needs a tree of named nodes addressable by source
 * range. `SourceParser` is the seam; `TreeSitterParser` implements it with
 * web-tree-sitter and the prebuilt grammars shipped in tree-sitter-wasms.
 */

import Parser from 'web-tree-sitter';
import { GRAMMARS, type GrammarId } from './languages.js';

/** The part of a syntax node the extractor reads */
export interface SyntaxNodeLike {
  readonly type: string;
  /** Offset of the node's first character in the parsed source string */
  readonly startIndex: number;
  readonly endIndex: number;
  readonly namedChildren: readonly SyntaxNodeLike[];
}

export interface SourceParser {
  /**
   * Parse `source` and hand the root node to `visit`. The tree is only valid
   * for the duration of the callback.
   */
  parse<T>(source: string, grammar: GrammarId, visit: (root: SyntaxNodeLike) => T): Promise<T>;
}

export type WasmResolver = (wasmFile: string) => string;

export const defaultWasmResolver: WasmResolver = (wasmFile) =>
  require.resolve(`tree-sitter-wasms/out/${wasmFile}`);

export class TreeSitterParser implements SourceParser {
  private initPromise: Promise<void> | null = null;
  private readonly parsers = new Map<GrammarId, Promise<Parser>>();
  private readonly resolveWasm: WasmResolver;

  constructor(resolveWasm: WasmResolver = defaultWasmResolver) {
    this.resolveWasm = resolveWasm;
  }

  async parse<T>(source: string, grammar: GrammarId, visit: (root: SyntaxNodeLike) => T): Promise<T> {
    const parser = await this.getParser(grammar);
    const tree = parser.parse(source);
    try {
      return visit(tree.rootNode);
    } finally {
      tree.delete();
    }
  }

  /** Release every loaded parser */
  dispose(): void {
    for (const pending of this.parsers.values()) {
      void pending.then((parser) => parser.delete(), () => undefined);
    }
    this.parsers.clear();
  }

  private ensureInitialized(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = Parser.init();
    }
    return this.initPromise;
  }

  private getParser(grammar: GrammarId): Promise<Parser> {
    let pending = this.parsers.get(grammar);
    if (!pending) {
      pending = this.createParser(grammar);
      this.parsers.set(grammar, pending);
      // A failed grammar load may be retried by a later file
      void pending.catch(() => this.parsers.delete(grammar));
    }
    return pending;
  }

  private async createParser(grammar: GrammarId): Promise<Parser> {
    await this.ensureInitialized();
    const language = await Parser.Language.load(this.resolveWasm(GRAMMARS[grammar].wasmFile));
    const parser = new Parser();
    parser.setLanguage(language);
    return parser;
  }
}
