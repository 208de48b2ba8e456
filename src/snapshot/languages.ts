import * as path from 'path';

export type GrammarId = 'go' | 'javascript' | 'typescript' | 'tsx' | 'python';

export interface GrammarSpec {
  id: GrammarId;
  /** File name of the prebuilt grammar inside tree-sitter-wasms/out */
  wasmFile: string;
}

export const GRAMMARS: Readonly<Record<GrammarId, GrammarSpec>> = {
  go: { id: 'go', wasmFile: 'tree-sitter-go.wasm' },
  javascript: { id: 'javascript', wasmFile: 'tree-sitter-javascript.wasm' },
  typescript: { id: 'typescript', wasmFile: 'tree-sitter-typescript.wasm' },
  tsx: { id: 'tsx', wasmFile: 'tree-sitter-tsx.wasm' },
  python: { id: 'python', wasmFile: 'tree-sitter-python.wasm' },
};

/** Grammar used for files that have no recognised extension but are known by name */
export const DEFAULT_GRAMMAR: GrammarId = 'go';

const EXTENSION_GRAMMARS: Readonly<Record<string, GrammarId>> = {
  '.go': 'go',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'tsx',
  '.py': 'python',
};

/** Base-name prefixes routed to the default grammar */
const DEFAULT_GRAMMAR_PREFIXES = ['Dockerfile'];

export type LanguageMatch =
  | { kind: 'supported'; grammar: GrammarId }
  | { kind: 'unsupported'; extension: string };

/**
 * Pick the grammar for a file. Unknown files are reported, not thrown:
 * the snapshot keeps them with an empty identifier list.
 */
export function grammarForPath(filePath: string): LanguageMatch {
  const baseName = path.basename(filePath);
  if (DEFAULT_GRAMMAR_PREFIXES.some(prefix => baseName.startsWith(prefix))) {
    return { kind: 'supported', grammar: DEFAULT_GRAMMAR };
  }

  const extension = path.extname(baseName);
  const grammar = Object.prototype.hasOwnProperty.call(EXTENSION_GRAMMARS, extension)
    ? EXTENSION_GRAMMARS[extension]
    : undefined;

  if (grammar === undefined) {
    return { kind: 'unsupported', extension };
  }
  return { kind: 'supported', grammar };
}
