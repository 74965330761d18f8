/**
 * File writing operations using Effect Platform
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { validatePath } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Write binary data to file (overwrites if exists, creates if not)
 *
 * Missing parent directories are created.
 *
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example
 * ```typescript
 * await writeBytes("out/table.csv", new TextEncoder().encode("a,b\n"));
 * ```
 */
export async function writeBytes(path: string, content: Uint8Array): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const parentDir = pathService.dirname(validatedPath);
    const dirExists = yield* fs.exists(parentDir);
    if (!dirExists) {
      yield* fs.makeDirectory(parentDir, { recursive: true });
    }

    yield* fs.writeFile(validatedPath, content);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}
