import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { LauncherLogger } from '@main/services/logging/Logger';

const lockFileSchema = z.object({
  pid: z.number().int().positive(),
  createdAt: z.string().datetime()
});

const UNREADABLE_LOCK_GRACE_MS = 10_000;

export type InstallLockOwner = z.infer<typeof lockFileSchema>;

export type InstallLockAcquireResult =
  | { status: 'held'; lockPath: string }
  | { status: 'busy'; owner: InstallLockOwner | null }
  | { status: 'failed'; reason: string };

interface InstallLockOptions {
  versionsDir: string;
  logger: LauncherLogger;
  staleAfterMs?: number;
  pid?: number;
  now?: () => number;
  isProcessAlive?: (pid: number) => boolean;
}

export class InstallLock {
  readonly lockPath: string;
  private readonly logger: LauncherLogger;
  private readonly staleAfterMs: number;
  private readonly pid: number;
  private readonly now: () => number;
  private readonly isProcessAlive: (pid: number) => boolean;
  private held = false;

  constructor(options: InstallLockOptions) {
    this.lockPath = path.join(options.versionsDir, '.install.lock');
    this.logger = options.logger;
    this.staleAfterMs = Number.isFinite(options.staleAfterMs) ? Math.max(1, Math.trunc(options.staleAfterMs ?? 0)) : 30 * 60 * 1000;
    this.pid = options.pid ?? process.pid;
    this.now = options.now ?? Date.now;
    this.isProcessAlive = options.isProcessAlive ?? defaultIsProcessAlive;
  }

  tryAcquire(): InstallLockAcquireResult {
    if (this.held) {
      return { status: 'held', lockPath: this.lockPath };
    }

    try {
      return this.acquire();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('install.lock.error', {
        lockPath: this.lockPath,
        reason
      });
      return { status: 'failed', reason };
    }
  }

  release(): void {
    if (!this.held) {
      return;
    }

    this.held = false;
    try {
      fs.rmSync(this.lockPath, { force: true });
    } catch (error) {
      this.logger.warn('install.lock.release_failed', {
        lockPath: this.lockPath,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }

  /**
   * True when a lock file exists and belongs to a live, recent owner.
   */
  isHeldByOther(): boolean {
    if (this.held || !fs.existsSync(this.lockPath)) {
      return false;
    }

    return !this.isStale(this.readOwner());
  }

  private acquire(): InstallLockAcquireResult {
    if (this.createExclusive()) {
      return { status: 'held', lockPath: this.lockPath };
    }

    const owner = this.readOwner();
    if (!this.isStale(owner)) {
      this.logger.info('install.lock.busy', {
        lockPath: this.lockPath,
        owner
      });
      return { status: 'busy', owner };
    }

    this.logger.warn('install.lock.stale_reclaimed', {
      lockPath: this.lockPath,
      owner
    });
    fs.rmSync(this.lockPath, { force: true });

    if (this.createExclusive()) {
      return { status: 'held', lockPath: this.lockPath };
    }

    return { status: 'busy', owner: this.readOwner() };
  }

  private createExclusive(): boolean {
    const owner: InstallLockOwner = {
      pid: this.pid,
      createdAt: new Date(this.now()).toISOString()
    };

    try {
      fs.writeFileSync(this.lockPath, JSON.stringify(owner), { encoding: 'utf-8', flag: 'wx' });
      this.held = true;
      return true;
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }
  }

  private readOwner(): InstallLockOwner | null {
    try {
      const parsed = lockFileSchema.safeParse(JSON.parse(fs.readFileSync(this.lockPath, 'utf-8')));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private isStale(owner: InstallLockOwner | null): boolean {
    if (!owner) {
      // arquivo ilegivel pode ser outro processo no meio da escrita
      return this.now() - this.lockMtimeMs() > UNREADABLE_LOCK_GRACE_MS;
    }

    if (owner.pid !== this.pid && !this.isProcessAlive(owner.pid)) {
      return true;
    }

    return this.now() - Date.parse(owner.createdAt) > this.staleAfterMs;
  }

  private lockMtimeMs(): number {
    try {
      return fs.statSync(this.lockPath).mtimeMs;
    } catch {
      return 0;
    }
  }
}

function defaultIsProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isErrnoCode(error, 'EPERM');
  }
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
