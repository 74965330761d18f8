/**
 * In-memory byte sources for the synchronous scanner
 */

import { type } from "arktype";
import { toBytes } from "../bytes";
import { ConfigurationError } from "../errors";
import type { ByteSource } from "./types";

const ChunkSizeSchema = type("number.integer>0");

/**
 * Serves a buffer, optionally cut into fixed-size chunks
 */
export class BufferSource implements ByteSource {
  private readonly data: Uint8Array;
  private readonly chunkSize: number;
  private position = 0;

  /**
   * @param chunkSize - bytes per read; the whole buffer at once by default
   * @throws {ConfigurationError} when `chunkSize` is not a positive integer
   */
  constructor(data: Uint8Array | string, chunkSize?: number) {
    this.data = toBytes(data);
    if (chunkSize !== undefined && ChunkSizeSchema(chunkSize) instanceof type.errors) {
      throw new ConfigurationError(`Invalid chunk size: ${chunkSize}`, "scanner");
    }
    this.chunkSize = chunkSize ?? Math.max(this.data.length, 1);
  }

  read(): Uint8Array | null {
    if (this.position >= this.data.length) {
      return null;
    }
    const end = Math.min(this.data.length, this.position + this.chunkSize);
    const chunk = this.data.subarray(this.position, end);
    this.position = end;
    return chunk;
  }
}

/**
 * Serves the chunks of any synchronous iterable, e.g. a generator
 */
export class IterableSource implements ByteSource {
  private readonly iterator: Iterator<Uint8Array | string>;

  constructor(chunks: Iterable<Uint8Array | string>) {
    this.iterator = chunks[Symbol.iterator]();
  }

  read(): Uint8Array | null {
    const next = this.iterator.next();
    return next.done === true ? null : toBytes(next.value);
  }
}
