/**
 * Unit tests for identifier extraction and language dispatch
 *
 * Syntax trees are built by hand so the walk can be checked without a
 * grammar engine.
 */

import { describe, it, expect } from '@jest/globals';
import { IdentifierExtractor, extractIdentifiers, isMeaningfulIdentifier } from '../../src/snapshot/extractor.js';
import { grammarForPath, type GrammarId } from '../../src/snapshot/languages.js';
import type { SourceParser, SyntaxNodeLike } from '../../src/snapshot/parser.js';

interface FakeNode extends SyntaxNodeLike {
  readonly namedChildren: FakeNode[];
}

/** Build a node covering the first occurrence of `text` in `source` */
function node(source: string, type: string, text: string, children: FakeNode[] = []): FakeNode {
  const startIndex = source.indexOf(text);
  if (startIndex < 0) {
    throw new Error(`"${text}" not in source`);
  }
  return { type, startIndex, endIndex: startIndex + text.length, namedChildren: children };
}

describe('Language dispatch', () => {
  it('should map known extensions to grammars', () => {
    const cases: Array<[string, GrammarId]> = [
      ['main.go', 'go'],
      ['app.js', 'javascript'],
      ['view.jsx', 'javascript'],
      ['lib.ts', 'typescript'],
      ['view.tsx', 'tsx'],
      ['tool.py', 'python'],
    ];
    for (const [file, grammar] of cases) {
      expect(grammarForPath(file)).toEqual({ kind: 'supported', grammar });
    }
  });

  it('should use the default grammar for Dockerfiles', () => {
    expect(grammarForPath('deploy/Dockerfile')).toEqual({ kind: 'supported', grammar: 'go' });
    expect(grammarForPath('Dockerfile.dev')).toEqual({ kind: 'supported', grammar: 'go' });
  });

  it('should report unknown extensions', () => {
    expect(grammarForPath('README.md')).toEqual({ kind: 'unsupported', extension: '.md' });
    expect(grammarForPath('Makefile')).toEqual({ kind: 'unsupported', extension: '' });
  });
});

describe('extractIdentifiers', () => {
  it('should keep identifiers longer than one character', () => {
    expect(isMeaningfulIdentifier('ab')).toBe(true);
    expect(isMeaningfulIdentifier('a')).toBe(false);
    expect(isMeaningfulIdentifier('a b')).toBe(false);
  });

  it('should harvest every identifier below a declaration', () => {
    const source = 'func Greet(name string) { fmt.Println(name) }';
    const root = node(source, 'source_file', source, [
      node(source, 'function_declaration', source, [
        node(source, 'identifier', 'Greet'),
        node(source, 'parameter_list', '(name string)', [node(source, 'identifier', 'name')]),
        node(source, 'block', '{ fmt.Println(name) }', [
          node(source, 'package_identifier', 'fmt'),
          node(source, 'field_identifier', 'Println'),
        ]),
      ]),
    ]);

    expect(extractIdentifiers(root, source)).toEqual(new Set(['Greet', 'name', 'fmt', 'Println']));
  });

  it('should drop single-character identifiers', () => {
    const source = 'x := yy';
    const root = node(source, 'source_file', source, [
      node(source, 'identifier', 'x'),
      node(source, 'identifier', 'yy'),
    ]);

    expect(extractIdentifiers(root, source)).toEqual(new Set(['yy']));
  });

  it('should ignore nodes that are not identifiers', () => {
    const source = 'import "strings"';
    const root = node(source, 'source_file', source, [node(source, 'interpreted_string_literal', '"strings"')]);

    expect(extractIdentifiers(root, source).size).toBe(0);
  });

  it('should only collect identifier kinds inside a declaration', () => {
    const source = 'type Point struct { X, Y int }';
    const harvested = node(source, 'type_declaration', source, [
      node(source, 'type_identifier', 'Point'),
      node(source, 'field_identifier', 'X'),
      node(source, 'identifier', 'int'),
    ]);
    const root = node(source, 'source_file', source, [harvested]);

    // type_identifier is not collected; X is too short
    expect(extractIdentifiers(root, source)).toEqual(new Set(['int']));
  });
});

describe('IdentifierExtractor', () => {
  function fakeParser(build: (source: string) => SyntaxNodeLike): SourceParser {
    return {
      parse: async (source, _grammar, visit) => visit(build(source)),
    };
  }

  it('should extract identifiers for supported files', async () => {
    const source = 'package main';
    const extractor = new IdentifierExtractor(
      fakeParser((src) => node(src, 'source_file', src, [node(src, 'package_identifier', 'main')]))
    );

    expect(await extractor.extract('cmd/main.go', source)).toEqual({
      kind: 'extracted',
      grammar: 'go',
      identifiers: ['main'],
    });
  });

  it('should not call the parser for unsupported files', async () => {
    let calls = 0;
    const extractor = new IdentifierExtractor({
      parse: async (_source, _grammar, visit) => {
        calls++;
        return visit({ type: 'source_file', startIndex: 0, endIndex: 0, namedChildren: [] });
      },
    });

    expect(await extractor.extract('notes.txt', 'hello')).toEqual({ kind: 'unsupported', extension: '.txt' });
    expect(calls).toBe(0);
  });

  it('should report parser failures instead of throwing', async () => {
    const extractor = new IdentifierExtractor({
      parse: async () => {
        throw new Error('grammar failed to load');
      },
    });

    expect(await extractor.extract('lib.py', 'def f(): pass')).toEqual({
      kind: 'failed',
      grammar: 'python',
      error: 'grammar failed to load',
    });
  });
});
