/**
 * Byte-level helpers shared by the scanner, sniffer and writer
 */

export const LF = 0x0a;
export const CR = 0x0d;
export const SPACE = 0x20;
export const TAB = 0x09;

export const EMPTY_BYTES = new Uint8Array(0);

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Encode a string as UTF-8
 */
export function encode(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Decode UTF-8 bytes to a string (invalid sequences become U+FFFD)
 */
export function decode(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Accept either form at API boundaries
 */
export function toBytes(input: string | Uint8Array): Uint8Array {
  return typeof input === "string" ? encode(input) : input;
}

/**
 * Byte value of a dialect character, 0 for the empty string
 */
export function charByte(char: string): number {
  return char.length === 0 ? 0 : char.charCodeAt(0);
}

/**
 * Dialect character of a byte value, the empty string for 0
 */
export function byteChar(byte: number): string {
  return byte === 0 ? "" : String.fromCharCode(byte);
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) {
    total += part.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function startsWith(data: Uint8Array, prefix: Uint8Array): boolean {
  if (prefix.length > data.length) {
    return false;
  }
  for (let i = 0; i < prefix.length; i++) {
    if (data[i] !== prefix[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Index of the first occurrence of `needle` at or after `from`, -1 if absent
 */
export function indexOfBytes(haystack: Uint8Array, needle: Uint8Array, from = 0): number {
  if (needle.length === 0) {
    return from <= haystack.length ? from : -1;
  }
  const first = needle[0];
  const last = haystack.length - needle.length;
  for (let i = haystack.indexOf(first ?? 0, from); i !== -1 && i <= last; i = haystack.indexOf(first ?? 0, i + 1)) {
    let j = 1;
    while (j < needle.length && haystack[i + j] === needle[j]) {
      j++;
    }
    if (j === needle.length) {
      return i;
    }
  }
  return -1;
}

/**
 * Number of non-overlapping occurrences of a non-empty `needle`
 */
export function countOccurrences(haystack: Uint8Array, needle: Uint8Array): number {
  if (needle.length === 0) {
    return 0;
  }
  let count = 0;
  let i = indexOfBytes(haystack, needle);
  while (i !== -1) {
    count++;
    i = indexOfBytes(haystack, needle, i + needle.length);
  }
  return count;
}

/**
 * Collapse every `<escape><quote>` pair into a single quote, in place
 *
 * One left-to-right pass over `buffer[0, length)`; a quote produced by the
 * pass is never paired again, so lone quotes pass through untouched.
 *
 * @returns the new logical length
 */
export function unescapeInPlace(buffer: Uint8Array, length: number, escape: number, quote: number): number {
  if (length === 0 || escape === 0) {
    return length;
  }
  let w = 0;
  for (let r = 0; r < length; r++) {
    const byte = buffer[r] ?? 0;
    if (byte === escape && r + 1 < length && buffer[r + 1] === quote) {
      buffer[w++] = quote;
      r++;
    } else {
      buffer[w++] = byte;
    }
  }
  return w;
}

/**
 * Copying form of {@link unescapeInPlace}
 */
export function unescapeQuotes(value: Uint8Array, escape: number, quote: number): Uint8Array {
  const copy = value.slice();
  return copy.subarray(0, unescapeInPlace(copy, copy.length, escape, quote));
}

/**
 * Growable byte buffer reused across fields and writes
 */
export class ByteBuffer {
  private data: Uint8Array;
  private size = 0;

  constructor(initialCapacity = 256) {
    this.data = new Uint8Array(initialCapacity);
  }

  get length(): number {
    return this.size;
  }

  append(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.data.set(bytes, this.size);
    this.size += bytes.length;
  }

  appendByte(byte: number): void {
    this.reserve(1);
    this.data[this.size++] = byte;
  }

  clear(): void {
    this.size = 0;
  }

  /**
   * View of the current contents; overwritten by the next mutation
   */
  view(): Uint8Array {
    return this.data.subarray(0, this.size);
  }

  unescapeQuotes(escape: number, quote: number): void {
    this.size = unescapeInPlace(this.data, this.size, escape, quote);
  }

  private reserve(extra: number): void {
    const needed = this.size + extra;
    if (needed <= this.data.length) {
      return;
    }
    let capacity = Math.max(this.data.length, 1);
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.data.subarray(0, this.size));
    this.data = grown;
  }
}
