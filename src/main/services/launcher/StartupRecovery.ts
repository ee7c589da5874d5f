import fs from 'node:fs';
import path from 'node:path';
import type { LauncherLogger } from '@main/services/logging/Logger';
import type { InstallLock } from '@main/services/install/InstallLock';
import { isTransientDirectoryName } from '@main/services/versions/VersionTag';
import type { VersionStore } from '@main/services/versions/VersionStore';

export interface StartupRecoveryReport {
  skipped: boolean;
  removed: string[];
  failed: Array<{ target: string; reason: string }>;
}

interface StartupRecoveryOptions {
  versionStore: VersionStore;
  installLock: InstallLock;
  logger: LauncherLogger;
  rmSync?: (target: string) => void;
}

export class StartupRecovery {
  private readonly versionStore: VersionStore;
  private readonly installLock: InstallLock;
  private readonly logger: LauncherLogger;
  private readonly rmSync: (target: string) => void;

  constructor(options: StartupRecoveryOptions) {
    this.versionStore = options.versionStore;
    this.installLock = options.installLock;
    this.logger = options.logger;
    this.rmSync = options.rmSync ?? ((target) => fs.rmSync(target, { recursive: true, force: true }));
  }

  /**
   * Clears what an interrupted run can leave behind. Skipped entirely while another
   * live launcher owns the install lock, since its staging directory is in use.
   */
  recover(): StartupRecoveryReport {
    if (this.installLock.isHeldByOther()) {
      this.logger.info('launcher.recovery.skipped', {
        reason: 'install_lock_busy'
      });
      return { skipped: true, removed: [], failed: [] };
    }

    const targets = this.collectTargets();
    const report: StartupRecoveryReport = { skipped: false, removed: [], failed: [] };
    for (const target of targets) {
      // outra instancia pode ter pego o lock depois da primeira verificacao
      if (this.installLock.isHeldByOther()) {
        this.logger.info('launcher.recovery.skipped', {
          reason: 'install_lock_taken',
          remaining: targets.length - report.removed.length - report.failed.length
        });
        report.skipped = true;
        break;
      }

      try {
        this.rmSync(target);
        report.removed.push(target);
      } catch (error) {
        report.failed.push({
          target,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }

    if (report.removed.length > 0 || report.failed.length > 0) {
      this.logger.info('launcher.recovery.finish', report);
    }
    return report;
  }

  private collectTargets(): string[] {
    const targets: string[] = [];
    const versionsDir = this.versionStore.versionsDir;

    if (fs.existsSync(versionsDir)) {
      for (const entry of fs.readdirSync(versionsDir, { withFileTypes: true })) {
        if (entry.isDirectory() && isTransientDirectoryName(entry.name)) {
          targets.push(path.join(versionsDir, entry.name));
        }
      }
    }

    if (fs.existsSync(this.versionStore.recordTempPath)) {
      targets.push(this.versionStore.recordTempPath);
    }

    if (fs.existsSync(this.installLock.lockPath)) {
      targets.push(this.installLock.lockPath);
    }

    return targets.sort();
  }
}
