import { describe, it, expect } from 'vitest';
import { defaultCatalog } from '../../src/catalog';
import { violatesErPrinciple } from '../../src/rules/no-er-names';
import { lint } from '../helpers';

describe('violatesErPrinciple', () => {
  it('flags agent-noun suffixes in any position', () => {
    expect(violatesErPrinciple('DataProcessor', 'type', defaultCatalog)).toBe(true);
    expect(violatesErPrinciple('Parser', 'type', defaultCatalog)).toBe(true);
    expect(violatesErPrinciple('dataFetcher', 'variable', defaultCatalog)).toBe(true);
  });

  it('flags a suffix word anywhere in a type name', () => {
    expect(violatesErPrinciple('FilterGroup', 'type', defaultCatalog)).toBe(true);
  });

  it('flags a leading verb outside type names', () => {
    expect(violatesErPrinciple('getUser', 'method', defaultCatalog)).toBe(true);
    expect(violatesErPrinciple('fetch_data', 'function', defaultCatalog)).toBe(true);
    expect(violatesErPrinciple('GetUser', 'type', defaultCatalog)).toBe(false);
  });

  it('accepts nouns and allowed names', () => {
    expect(violatesErPrinciple('HttpClient', 'type', defaultCatalog)).toBe(false);
    expect(violatesErPrinciple('Server', 'type', defaultCatalog)).toBe(false);
    expect(violatesErPrinciple('counter', 'variable', defaultCatalog)).toBe(false);
    expect(violatesErPrinciple('total', 'variable', defaultCatalog)).toBe(false);
  });

  it('skips private and constant names', () => {
    expect(violatesErPrinciple('_handler', 'method', defaultCatalog)).toBe(false);
    expect(violatesErPrinciple('#loader', 'variable', defaultCatalog)).toBe(false);
    expect(violatesErPrinciple('MAX_RETRIES', 'variable', defaultCatalog)).toBe(false);
  });
});

describe('no-er-names', () => {
  it('reports variables at the identifier and functions at the declaration', () => {
    const diagnostics = lint(`const loadConfig = 1;
function parseInput() {}
let sortedItems = [];`);

    expect(diagnostics.map((d) => [d.code, d.line, d.column])).toEqual([
      ['EO003', 1, 6],
      ['EO004', 2, 0],
    ]);
    expect(diagnostics[0].message).toBe(
      "EO003 Variable name 'loadConfig' violates -er principle (should be noun, not verb)"
    );
    expect(diagnostics[1].message).toBe(
      "EO004 Function name 'parseInput' violates -er principle (should be noun, not verb)"
    );
  });

  it('checks interfaces and their method signatures', () => {
    const diagnostics = lint('interface DocumentFormatter { formatText(): string; }');

    expect(diagnostics.map((d) => d.message)).toEqual([
      "EO001 Class name 'DocumentFormatter' violates -er principle (describes what it does, not what it is)",
      "EO002 Method name 'formatText' violates -er principle (should be noun, not verb)",
    ]);
  });

  it('checks plain assignments and class fields', () => {
    const diagnostics = lint(`worker = 1;
class Route implements Path { handler = 1; }`);

    expect(diagnostics.map((d) => d.message)).toEqual([
      "EO003 Variable name 'worker' violates -er principle (should be noun, not verb)",
      "EO003 Variable name 'handler' violates -er principle (should be noun, not verb)",
    ]);
  });

  it('does not check constructors', () => {
    expect(lint('class Box implements Shape { constructor() {} }')).toEqual([]);
  });
});
