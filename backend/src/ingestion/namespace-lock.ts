import { mkdir } from "fs/promises";
import path from "path";
import { Mutex } from "async-mutex";
import lockfile from "proper-lockfile";
import { componentLogger } from "../logger.js";

const logger = componentLogger("namespace-lock");

export interface NamespaceLockOptions {
  /**
   * Directory for the per-namespace lock files shared by every process that
   * writes to the same index. Without it the lock only holds inside this process.
   */
  lockDir?: string;
  /** Attempts to take a lock file held by another process before giving up. */
  retries?: number;
  /** A lock file not refreshed for this long is treated as abandoned. */
  staleMs?: number;
}

function lockFileName(namespace: string): string {
  return `namespace-${namespace.replace(/[^A-Za-z0-9_-]/g, "_")}`;
}

/**
 * One lock per index namespace. Ingest, clear and merge-ingest on the same
 * namespace run one after another, across processes when a lock directory
 * is set; different namespaces do not block each other. Queries never take
 * the lock.
 */
export class NamespaceLock {
  private readonly mutexes = new Map<string, Mutex>();
  private readonly lockDir?: string;
  private readonly retries: number;
  private readonly staleMs: number;

  constructor(options: NamespaceLockOptions = {}) {
    this.lockDir = options.lockDir;
    this.retries = options.retries ?? 100;
    this.staleMs = options.staleMs ?? 30000;
  }

  private mutexFor(namespace: string): Mutex {
    let mutex = this.mutexes.get(namespace);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(namespace, mutex);
    }
    return mutex;
  }

  private async acquireFile(namespace: string): Promise<() => Promise<void>> {
    if (!this.lockDir) {
      return async () => {};
    }

    await mkdir(this.lockDir, { recursive: true });
    const target = path.join(this.lockDir, lockFileName(namespace));
    const release = await lockfile.lock(target, {
      realpath: false,
      stale: this.staleMs,
      retries: { retries: this.retries, factor: 1.5, minTimeout: 50, maxTimeout: 2000 },
      onCompromised: (error) => {
        logger.error({ error, namespace }, "Namespace lock file was compromised");
      },
    });
    logger.debug({ namespace, target }, "Namespace lock file acquired");
    return release;
  }

  run<T>(namespace: string, operation: () => Promise<T>): Promise<T> {
    return this.mutexFor(namespace).runExclusive(async () => {
      const release = await this.acquireFile(namespace);
      try {
        return await operation();
      } finally {
        await release();
      }
    });
  }

  isLocked(namespace: string): boolean {
    return this.mutexes.get(namespace)?.isLocked() ?? false;
  }
}
