import {
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "fs";
import { dirname } from "path";

const LOCK_TIMEOUT_MS = 10_000;
const LOCK_POLL_MS = 50;
const STALE_LOCK_MS = 30_000;

export interface FileLockOptions {
  timeoutMs?: number;
  pollMs?: number;
  staleMs?: number;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function tryOpenExclusive(lockFile: string): number | null {
  try {
    return openSync(lockFile, "wx");
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") return null;
    throw error;
  }
}

export async function withFileLock<T>(
  lockFile: string,
  fn: () => Promise<T> | T,
  options: FileLockOptions = {},
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? LOCK_TIMEOUT_MS;
  const pollMs = options.pollMs ?? LOCK_POLL_MS;
  const staleMs = options.staleMs ?? STALE_LOCK_MS;

  const dir = dirname(lockFile);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

  const deadline = Date.now() + timeoutMs;
  let fd = tryOpenExclusive(lockFile);

  while (fd === null && Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, pollMs));
    fd = tryOpenExclusive(lockFile);
  }

  if (fd === null) {
    // A holder that died without cleaning up leaves the file behind.
    const stat = statSync(lockFile, { throwIfNoEntry: false });
    if (!stat || Date.now() - stat.mtimeMs > staleMs) {
      if (stat) unlinkSync(lockFile);
      fd = tryOpenExclusive(lockFile);
    }
  }

  if (fd === null) {
    throw new Error(`Failed to acquire lock: ${lockFile}`);
  }

  try {
    return await fn();
  } finally {
    closeSync(fd);
    unlinkSync(lockFile);
  }
}

/** Write via a sibling temp file and rename, so readers never see a partial file. */
export function writeFileAtomic(path: string, content: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

  const tmpPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  writeFileSync(tmpPath, content, "utf-8");
  renameSync(tmpPath, path);
}
