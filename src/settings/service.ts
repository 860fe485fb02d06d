/**
 * Settings Module - Service Layer
 *
 * Owns the in-memory settings and keeps them in step with persistent
 * storage. Every save writes the full snapshot, never a single key.
 */
import { type Result, err, ok } from "neverthrow";
import type { ZodIssue } from "zod";

import { createLogger, logOperationFailed } from "../logger.js";
import {
  type KeyValueStorage,
  type StorageError,
  formatStorageError,
} from "../storage/index.js";
import type { Settings } from "./schema.js";
import { DEFAULT_SETTINGS, STORAGE_KEYS, SettingsSchema } from "./schema.js";
import { resolveSettings, toStorageEntries } from "./transform.js";

const log = createLogger("settings");

export type SettingsUpdateError =
  | { readonly type: "INVALID_SETTINGS"; readonly issues: ReadonlyArray<ZodIssue> }
  | { readonly type: "PERSIST_FAILED"; readonly error: StorageError };

export type SettingsStore = Readonly<{
  /** Read every key from storage; bootstraps the full snapshot if any is missing */
  load(): Settings;
  get(): Settings;
  save(): Result<void, StorageError>;
  /** Merge, validate and persist. The in-memory value is kept if persisting fails. */
  update(patch: Partial<Settings>): Result<Settings, SettingsUpdateError>;
}>;

export function createSettingsStore(storage: KeyValueStorage): SettingsStore {
  let current: Settings = DEFAULT_SETTINGS;

  const save = (): Result<void, StorageError> => {
    for (const entry of toStorageEntries(current)) {
      const written =
        entry.kind === "int"
          ? storage.setInt(entry.key, entry.value)
          : storage.setFloat(entry.key, entry.value);

      if (written.isErr()) {
        logOperationFailed(log, "saveSettings", formatStorageError(written.error), {
          key: entry.key,
        });
        return err(written.error);
      }
    }

    log.debug({ settings: current }, "Settings saved");
    return ok(undefined);
  };

  return {
    load() {
      const { settings, missing } = resolveSettings({
        dataGenIntervalSec: storage.getInt(STORAGE_KEYS.dataGenIntervalSec),
        dataPushIntervalSec: storage.getInt(STORAGE_KEYS.dataPushIntervalSec),
        outsideTempC: storage.getInt(STORAGE_KEYS.outsideTempC),
        targetTempC: storage.getFloat(STORAGE_KEYS.targetTempC),
        boardVariant: storage.getInt(STORAGE_KEYS.boardVariant),
      });
      current = settings;

      log.info({ ...settings }, "Settings loaded");

      if (missing.length > 0) {
        log.info({ missing }, "Missing keys in storage, saving defaults");
        if (save().isErr()) {
          log.warn("Defaults kept in memory only");
        }
      }

      return current;
    },

    get: () => current,

    save,

    update(patch) {
      const parsed = SettingsSchema.safeParse({ ...current, ...patch });
      if (!parsed.success) {
        return err({ type: "INVALID_SETTINGS", issues: parsed.error.issues });
      }

      current = parsed.data;

      const saved = save();
      if (saved.isErr()) {
        return err({ type: "PERSIST_FAILED", error: saved.error });
      }

      return ok(current);
    },
  };
}
