import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { isProvenance, type Provenance } from "../usage/types.js";
import { withFileLock } from "../utils/file-lock.js";

export const PREFERRED_PROVENANCE_KEY = "preferredProvenance";

/** Key-value settings that survive restarts. */
export interface PreferenceStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
}

const preferencesFileSchema = z.record(z.string(), z.string());

/** Preferences kept in `<stateDir>/preferences.json`. */
export class JsonPreferenceStore implements PreferenceStore {
  private readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = join(stateDir, "preferences.json");
  }

  async get(key: string): Promise<string | null> {
    const values = await this.readAll();
    return values[key] ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    await withFileLock(this.filePath, async () => {
      const values = await this.readAll();
      values[key] = value;
      await writeFile(this.filePath, `${JSON.stringify(values, null, 2)}\n`, "utf-8");
    });
  }

  private async readAll(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
      throw err;
    }
    // An unreadable file is treated as empty; the next set() rewrites it.
    try {
      const parsed = preferencesFileSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : {};
    } catch {
      return {};
    }
  }
}

/** Reads the stored provenance; anything missing or unknown means "primary". */
export async function loadPreferredProvenance(
  store: PreferenceStore,
  logger: Logger,
): Promise<Provenance> {
  try {
    const value = await store.get(PREFERRED_PROVENANCE_KEY);
    if (value === null) return "primary";
    if (isProvenance(value)) return value;
    logger.warn({ value }, "Unknown preferred provenance stored, using primary");
  } catch (err) {
    logger.warn({ err }, "Could not read preferences, using primary");
  }
  return "primary";
}
