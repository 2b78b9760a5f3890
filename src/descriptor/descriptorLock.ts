import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import type { Outcome } from "../types/failure";
import { errorCode, errorMessage, fail } from "../types/failure";
import { ok } from "../types/result";
import { descriptorLockPath } from "../io/paths";
import { nowUtcIsoSeconds } from "../utils/time";

export interface DescriptorLock {
  path: string;
  release(): Promise<void>;
}

/**
 * Takes the per-dataset advisory lock by creating the lock file exclusively.
 * A lock left behind by a crashed run has to be removed by hand.
 */
export async function acquireDescriptorLock(datasetRoot: string): Promise<Outcome<DescriptorLock>> {
  const lockPath = descriptorLockPath(datasetRoot);
  let handle: FileHandle;
  try {
    handle = await fs.open(lockPath, "wx");
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      const holder = await fs.readFile(lockPath, "utf8").catch(() => "");
      return fail("DescriptorLocked", `Another run holds ${lockPath}${holder ? `: ${holder.trim()}` : ""}`, {
        retryable: true
      });
    }
    return fail("DescriptorLocked", `Cannot create lock ${lockPath}: ${errorMessage(error)}`);
  }

  try {
    await handle.writeFile(JSON.stringify({ pid: process.pid, acquired_at: nowUtcIsoSeconds() }), "utf8");
  } catch (error) {
    await handle.close();
    await fs.rm(lockPath, { force: true });
    return fail("DescriptorLocked", `Cannot write lock ${lockPath}: ${errorMessage(error)}`);
  }
  await handle.close();

  return ok({
    path: lockPath,
    release: async () => {
      await fs.rm(lockPath, { force: true });
    }
  });
}
