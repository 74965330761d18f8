/**
 * Separator and quote statistics tests
 */

import { describe, expect, test } from "vitest";
import { charByte, encode } from "../../src/bytes";
import { DEFAULT_QUOTES, DEFAULT_SEPARATORS } from "../../src/sniffer/constants";
import { collectStats, pairKey } from "../../src/sniffer/stats";

const separators = DEFAULT_SEPARATORS.map(charByte);
const quotes = DEFAULT_QUOTES.map(charByte);

const COMMA = charByte(",");
const SEMICOLON = charByte(";");
const DOUBLE = charByte('"');
const SINGLE = charByte("'");

describe("collectStats", () => {
  test("scores a fully quoted line", () => {
    const stats = collectStats(encode('"a","b","c"'), separators, quotes);

    expect([...stats.separators]).toEqual([[COMMA, 12]]);
    expect([...stats.quotes]).toEqual([[DOUBLE, 21]]);
    expect([...stats.pairs]).toEqual([[pairKey(COMMA, DOUBLE), 12]]);
  });

  test("keeps only candidates that scored", () => {
    const stats = collectStats(encode('"a","b";"c"'), separators, quotes);

    expect(Object.fromEntries(stats.separators)).toEqual({ [COMMA]: 8, [SEMICOLON]: 4 });
    expect([...stats.quotes]).toEqual([[DOUBLE, 21]]);
    expect(stats.pairs.size).toBe(2);
  });

  test("pairs each separator with the quotes beside it", () => {
    const stats = collectStats(encode(`"a","b";'c'"`), separators, quotes);

    expect(Object.fromEntries(stats.quotes)).toEqual({ [DOUBLE]: 18, [SINGLE]: 3 });
    expect(Object.fromEntries(stats.pairs)).toEqual({
      [pairKey(COMMA, DOUBLE)]: 6,
      [pairKey(SEMICOLON, DOUBLE)]: 3,
      [pairKey(SEMICOLON, SINGLE)]: 3,
    });
  });

  test("empty input scores nothing", () => {
    const stats = collectStats(new Uint8Array(0), separators, quotes);

    expect(stats.separators.size).toBe(0);
    expect(stats.quotes.size).toBe(0);
    expect(stats.pairs.size).toBe(0);
  });
});
