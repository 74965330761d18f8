/**
 * File reading through Effect Platform
 *
 * Effect handles the platform details; callers get Promise-based functions
 * and {@link FileError} on failure.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Chunk, Effect, Stream } from "effect";
import { concatBytes } from "../bytes";
import { FileError } from "../errors";
import { getPlatform } from "./runtime";

/**
 * Read buffer size for file streams (64KB)
 */
export const DEFAULT_READ_BUFFER_SIZE = 65_536;

export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

/**
 * Validate a file path with ArkType
 *
 * @throws {FileError} for an empty path or one containing NUL
 */
export function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Fail early, with a file error, when the path is not a readable regular file
 */
async function assertRegularFile(path: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(path);
    return info.type;
  });

  let fileType: string;
  try {
    fileType = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", path, error);
  }

  if (fileType !== "File") {
    throw new FileError(`Not a regular file (${fileType})`, path, "stat");
  }
}

/**
 * Create a streaming reader for a file, starting `offset` bytes in
 *
 * @throws {FileError} if the file does not exist or is not a regular file
 */
export async function createStream(
  path: string,
  bufferSize: number = DEFAULT_READ_BUFFER_SIZE,
  offset = 0
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  await assertRegularFile(validatedPath);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, { bufferSize, offset });
    return Stream.toReadableStream(effectStream);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

/**
 * Read at most `size` bytes from the start of a file
 *
 * @throws {FileError} if the file cannot be read
 */
export async function readSample(path: string, size: number): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  await assertRegularFile(validatedPath);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const chunks = yield* Stream.runCollect(fs.stream(validatedPath, { bytesToRead: size }));
    return concatBytes(Chunk.toReadonlyArray(chunks));
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}
