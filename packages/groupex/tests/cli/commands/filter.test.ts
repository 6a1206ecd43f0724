import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { filter, lineMatches } from '../../../src/cli/commands/filter.js';
import { compileGrammar, loadBuiltinGrammar } from '../../../src/grammar/index.js';

const TEST_DIR = join(tmpdir(), 'groupex-filter-test-' + Date.now());
const SONGS = join(TEST_DIR, 'songs.txt');

const EXPRESSION = 'marley && (stephen && !(ziggy || damian) || bob)';

describe('CLI filter', () => {
  let logSpy: MockInstance<Parameters<typeof console.log>, void>;

  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
    writeFileSync(
      SONGS,
      [
        'Bob Marley - Jammin',
        'Stephen Marley - Break Us Apart',
        '',
        'Stephen & Damian Marley - Medication',
        'Ziggy Marley - Dragonfly',
        'Duane Stephenson - Exhale',
        "Tanya Stephens - It's a Pity",
        '',
      ].join('\n'),
      'utf-8',
    );
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    vi.restoreAllMocks();
  });

  it('should print the matching lines', () => {
    const result = filter({ expression: EXPRESSION, file: SONGS });

    expect(result).toEqual({
      success: true,
      matches: ['Bob Marley - Jammin', 'Stephen Marley - Break Us Apart'],
      total: 6,
    });
    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenNthCalledWith(1, 'Bob Marley - Jammin');
    expect(logSpy).toHaveBeenNthCalledWith(2, 'Stephen Marley - Break Us Apart');
  });

  it('should print JSON', () => {
    filter({ expression: 'ziggy || tanya', file: SONGS, json: true });
    expect(logSpy).toHaveBeenCalledWith(
      JSON.stringify({ matches: ['Ziggy Marley - Dragonfly', "Tanya Stephens - It's a Pity"], total: 6 }, null, 2),
    );
  });

  it('should report a syntax error in the expression', () => {
    const result = filter({ expression: 'marley &&', file: SONGS });
    expect(result).toEqual({
      success: false,
      matches: [],
      total: 6,
      error: 'Left or right operand is missing at position 7',
    });
  });

  it('should report a missing file', () => {
    const path = join(TEST_DIR, 'nope.txt');
    const result = filter({ expression: 'bob', file: path });
    expect(result).toEqual({ success: false, matches: [], total: 0, error: `File not found: ${path}` });
  });

  it('should match tokens case-insensitively', () => {
    const { parser } = compileGrammar(loadBuiltinGrammar('boolean'));
    const root = parser.parse('BOB && !Ziggy');
    expect(lineMatches(root, 'bob marley')).toBe(true);
    expect(lineMatches(root, 'Ziggy and Bob')).toBe(false);
  });
});
