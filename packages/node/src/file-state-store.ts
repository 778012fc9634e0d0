/**
 * File-based state storage.
 *
 * Keeps every applied integration in one JSON lock file:
 * `{ "version": 1, "key": "converge-lock", "data": { "<id>": record } }`.
 * Each write replaces the whole file atomically with owner-only permissions.
 */

import createDebug from "debug";
import * as fs from "fs/promises";
import * as path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import {
  StateStoreError,
  storedRecordSchema,
  type StateStore,
  type StoredRecord,
  type StoredState,
} from "@converge/proto";

const debug = createDebug("converge:node:file-state");

export const STATE_FILE_VERSION = 1;
export const STATE_FILE_KEY = "converge-lock";

/** Required file permissions for the state file (owner read/write only) */
const STATE_FILE_MODE = 0o600;

/** Required directory permissions (owner read/write/execute only) */
const STATE_DIR_MODE = 0o700;

const stateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  key: z.literal(STATE_FILE_KEY),
  data: z.record(z.string(), storedRecordSchema),
});

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function stateError(message: string, error: unknown): StateStoreError {
  return new StateStoreError(`${message}: ${error instanceof Error ? error.message : String(error)}`, {
    cause: error instanceof Error ? error : undefined,
    source: "file-state-store",
  });
}

export class FileStateStore implements StateStore {
  // Writes rewrite the whole file, so they run one at a time
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Load all records in file order. A missing file is an empty state.
   */
  async load(): Promise<StoredState> {
    await this.writeQueue;
    return this.read();
  }

  async save(configurationId: string, record: StoredRecord): Promise<void> {
    await this.mutate(`Failed to save ${configurationId}`, (state) => {
      state.set(configurationId, { ...record });
    });
    debug("Saved %s -> %s", configurationId, record.instanceHandle);
  }

  /**
   * Forget the record for a configuration id. No-op if absent.
   */
  async remove(configurationId: string): Promise<void> {
    await this.mutate(`Failed to remove ${configurationId}`, (state) => {
      state.delete(configurationId);
    });
    debug("Removed %s", configurationId);
  }

  private mutate(message: string, fn: (state: StoredState) => void): Promise<void> {
    const result = this.writeQueue.then(async () => {
      const state = await this.read();
      fn(state);
      try {
        await this.write(state);
      } catch (error) {
        throw stateError(message, error);
      }
    });
    this.writeQueue = result.catch((error) => {
      debug("State write failed: %s", error);
    });
    return result;
  }

  private async read(): Promise<StoredState> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        debug("No state file at %s", this.filePath);
        return new Map();
      }
      throw stateError(`Failed to read ${this.filePath}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw stateError(`State file ${this.filePath} is not valid JSON`, error);
    }

    const parsed = stateFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StateStoreError(
        `State file ${this.filePath} is malformed at ${issue.path.join(".") || "<root>"}: ${issue.message}`,
        { source: "file-state-store" }
      );
    }

    const state: StoredState = new Map();
    for (const [configurationId, record] of Object.entries(parsed.data.data)) {
      state.set(configurationId, record);
    }
    return state;
  }

  private async write(state: StoredState): Promise<void> {
    const data: Record<string, StoredRecord> = {};
    for (const [configurationId, record] of state) {
      data[configurationId] = record;
    }
    const content = JSON.stringify({ version: STATE_FILE_VERSION, key: STATE_FILE_KEY, data }, null, 2);

    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true, mode: STATE_DIR_MODE });
    await this.atomicWrite(content);
  }

  /**
   * Atomic write: write to temp file, then rename.
   */
  private async atomicWrite(content: string): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tempPath = path.join(dir, `.tmp-${randomUUID()}.json`);

    try {
      const handle = await fs.open(tempPath, "w", STATE_FILE_MODE);
      try {
        await handle.writeFile(content, "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }

      // Mode passed to open() is filtered by umask
      await fs.chmod(tempPath, STATE_FILE_MODE);
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      // Clean up temp file on failure
      await fs.unlink(tempPath).catch((unlinkError: unknown) => {
        debug("Failed to remove temp file %s: %s", tempPath, unlinkError);
      });
      throw error;
    }

    await syncDirectory(dir);
  }
}

/**
 * Flush a directory entry so a rename inside it survives power loss.
 */
export async function syncDirectory(dir: string): Promise<void> {
  const handle = await fs.open(dir, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}
