/**
 * Identifier extraction
 *
 * Walks the named nodes of a syntax tree. When a declaration-like node is
 * reached, every identifier leaf beneath it is harvested and the walk does
 * not descend past it, so no subtree is visited twice.
 */

import { errorMessage } from '../errors.js';
import { grammarForPath, type GrammarId } from './languages.js';
import type { SourceParser, SyntaxNodeLike } from './parser.js';

/** Node kinds that trigger a harvest of their subtree */
const HARVEST_KINDS = new Set([
  'function_declaration',
  'method_declaration',
  'struct_declaration',
  'interface_declaration',
  'type_declaration',
  'identifier',
  'field_identifier',
  'package_identifier',
]);

/** Leaf kinds whose text is collected */
const IDENTIFIER_KINDS = new Set([
  'identifier',
  'field_identifier',
  'package_identifier',
]);

const WHITESPACE = /\s/;

export function isMeaningfulIdentifier(text: string): boolean {
  return text.length > 1 && !WHITESPACE.test(text);
}

/**
 * Collect the unique identifiers declared or referenced under `root`.
 */
export function extractIdentifiers(root: SyntaxNodeLike, source: string): Set<string> {
  const terms = new Set<string>();
  const pending: SyntaxNodeLike[] = [root];

  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) break;

    if (HARVEST_KINDS.has(node.type)) {
      harvest(node, source, terms);
      continue;
    }

    pending.push(...node.namedChildren);
  }

  return terms;
}

function harvest(node: SyntaxNodeLike, source: string, terms: Set<string>): void {
  const pending: SyntaxNodeLike[] = [node];

  while (pending.length > 0) {
    const current = pending.pop();
    if (!current) break;

    if (IDENTIFIER_KINDS.has(current.type)) {
      const text = source.slice(current.startIndex, current.endIndex);
      if (isMeaningfulIdentifier(text)) {
        terms.add(text);
      }
    }

    pending.push(...current.namedChildren);
  }
}

export type ExtractionResult =
  | { kind: 'extracted'; grammar: GrammarId; identifiers: string[] }
  | { kind: 'unsupported'; extension: string }
  | { kind: 'failed'; grammar: GrammarId; error: string };

/**
 * Dispatches a file to its grammar and extracts identifiers. Never throws:
 * an unknown language or a parse failure is reported in the result.
 */
export class IdentifierExtractor {
  private readonly parser: SourceParser;

  constructor(parser: SourceParser) {
    this.parser = parser;
  }

  async extract(filePath: string, source: string): Promise<ExtractionResult> {
    const match = grammarForPath(filePath);
    if (match.kind === 'unsupported') {
      return { kind: 'unsupported', extension: match.extension };
    }

    try {
      const identifiers = await this.parser.parse(source, match.grammar, (root) =>
        Array.from(extractIdentifiers(root, source))
      );
      return { kind: 'extracted', grammar: match.grammar, identifiers };
    } catch (error) {
      return { kind: 'failed', grammar: match.grammar, error: errorMessage(error) };
    }
  }
}
