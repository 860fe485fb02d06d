/**
 * Storage Module - Service Layer
 *
 * JSON-file and in-memory implementations of KeyValueStorage.
 * The file variant rewrites the whole file synchronously on every set.
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { StorageError } from "./errors.js";
import { corruptFile, formatStorageError, writeFailed } from "./errors.js";
import type { KeyValueStorage, StorageFile } from "./schema.js";
import { StorageFileSchema } from "./schema.js";

const log = createLogger("storage");

const readInt = (entries: Map<string, number>, key: string) => {
  const value = entries.get(key);
  return value !== undefined && Number.isInteger(value) ? value : undefined;
};

/**
 * Load the storage file.
 *
 * @returns Parsed entries; an empty object when the file does not exist
 */
export function readStorageFile(
  filePath: string,
): Result<StorageFile, StorageError> {
  if (!existsSync(filePath)) {
    return ok({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(corruptFile(filePath, message));
  }

  const parsed = StorageFileSchema.safeParse(raw);
  if (!parsed.success) {
    return err(corruptFile(filePath, parsed.error.issues[0]?.message ?? "invalid"));
  }

  return ok(parsed.data);
}

/**
 * Create a storage backed by a JSON file.
 * An unreadable file is logged and treated as empty, so every key bootstraps.
 */
export function createJsonFileStorage(filePath: string): KeyValueStorage {
  const loaded = readStorageFile(filePath);
  if (loaded.isErr()) {
    log.warn({ filePath }, formatStorageError(loaded.error));
  }

  const entries = new Map<string, number>(
    Object.entries(loaded.unwrapOr({})),
  );

  const persist = (): Result<void, StorageError> => {
    try {
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(
        filePath,
        `${JSON.stringify(Object.fromEntries(entries), null, 2)}\n`,
        "utf8",
      );
      return ok(undefined);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(writeFailed(filePath, cause.message, cause));
    }
  };

  const set = (key: string, value: number): Result<void, StorageError> => {
    entries.set(key, value);
    return persist();
  };

  return {
    getInt: (key) => readInt(entries, key),
    setInt: set,
    getFloat: (key) => entries.get(key),
    setFloat: set,
  };
}

/**
 * Create a storage that lives only in memory.
 */
export function createMemoryStorage(
  initial: StorageFile = {},
): KeyValueStorage & { snapshot(): StorageFile } {
  const entries = new Map<string, number>(Object.entries(initial));

  const set = (key: string, value: number): Result<void, StorageError> => {
    entries.set(key, value);
    return ok(undefined);
  };

  return {
    getInt: (key) => readInt(entries, key),
    setInt: set,
    getFloat: (key) => entries.get(key),
    setFloat: set,
    snapshot: () => Object.fromEntries(entries),
  };
}
