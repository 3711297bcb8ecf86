import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  /** Age after which a lock left behind by a dead process is taken over. */
  readonly staleMs?: number;
}

/**
 * Runs `fn` while holding `<filePath>.lock`. The guarded file itself does not
 * need to exist yet; its directory is created on demand.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options?: FileLockOptions,
): Promise<T> {
  mkdirSync(dirname(filePath), { recursive: true });

  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: options?.retries ?? 5, minTimeout: 50, maxTimeout: 500 },
      stale: options?.staleMs ?? 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
