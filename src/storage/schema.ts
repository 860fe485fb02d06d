/**
 * Storage Module - Schemas and Types
 *
 * Persistent key-value storage for device settings. Reads return
 * `undefined` for absent keys instead of a sentinel default.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { StorageError } from "./errors.js";

export interface KeyValueStorage {
  getInt(key: string): number | undefined;
  setInt(key: string, value: number): Result<void, StorageError>;
  getFloat(key: string): number | undefined;
  setFloat(key: string, value: number): Result<void, StorageError>;
}

/**
 * On-disk layout: a flat JSON object of numeric entries.
 */
export const StorageFileSchema = z.record(z.string(), z.number().finite());

export type StorageFile = z.infer<typeof StorageFileSchema>;
