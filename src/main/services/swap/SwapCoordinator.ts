import fs from 'node:fs';
import path from 'node:path';
import type { LauncherErrorCode, VersionTag } from '@shared/contracts';
import type { LauncherLogger } from '@main/services/logging/Logger';
import { deletingDirectoryName, formatVersionTag, sameVersionTag } from '@main/services/versions/VersionTag';
import type { VersionStore } from '@main/services/versions/VersionStore';

export type PromoteResult =
  | { ok: true; version: VersionTag; previousVersion: VersionTag | null }
  | { ok: false; code: Extract<LauncherErrorCode, 'promotion_failed'>; reason: string };

export interface PruneResult {
  active: VersionTag | null;
  removed: VersionTag[];
  skipped: Array<{ version: VersionTag; reason: string }>;
}

interface SwapCoordinatorOptions {
  versionStore: VersionStore;
  logger: LauncherLogger;
  retainCount?: number;
  renameSync?: (from: string, to: string) => void;
  rmSync?: (target: string) => void;
}

export class SwapCoordinator {
  private readonly versionStore: VersionStore;
  private readonly logger: LauncherLogger;
  private readonly retainCount: number;
  private readonly renameSync: (from: string, to: string) => void;
  private readonly rmSync: (target: string) => void;

  constructor(options: SwapCoordinatorOptions) {
    this.versionStore = options.versionStore;
    this.logger = options.logger;
    this.retainCount = normalizeRetainCount(options.retainCount);
    this.renameSync = options.renameSync ?? fs.renameSync;
    this.rmSync = options.rmSync ?? ((target) => fs.rmSync(target, { recursive: true, force: true }));
  }

  promote(programId: string, version: VersionTag): PromoteResult {
    const versionText = formatVersionTag(version);
    if (!this.versionStore.hasFinalized(version)) {
      this.logger.error('swap.promote.error', {
        version: versionText,
        code: 'promotion_failed',
        reason: 'not_finalized'
      });
      return {
        ok: false,
        code: 'promotion_failed',
        reason: `Versao ${versionText} nao esta finalizada em disco.`
      };
    }

    const before = this.versionStore.readCurrent(programId);
    const previousVersion = before.kind === 'installed' ? before.version : null;

    try {
      this.versionStore.writeCurrent(programId, version);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('swap.promote.error', {
        version: versionText,
        previousVersion: previousVersion ? formatVersionTag(previousVersion) : null,
        code: 'promotion_failed',
        reason
      });
      return {
        ok: false,
        code: 'promotion_failed',
        reason: `Falha ao gravar versao atual: ${reason}`
      };
    }

    this.logger.info('swap.promote.finish', {
      programId,
      version: versionText,
      previousVersion: previousVersion ? formatVersionTag(previousVersion) : null
    });
    return { ok: true, version, previousVersion };
  }

  pruneOldVersions(programId: string, retainCount: number = this.retainCount): PruneResult {
    const keep = normalizeRetainCount(retainCount);
    const current = this.versionStore.readCurrent(programId);
    const active = current.kind === 'installed' ? current.version : null;
    const finalized = this.versionStore.listVersionDirectories();

    const candidates = finalized.filter((tag) => !sameVersionTag(tag, active));
    const activeOnDisk = finalized.length !== candidates.length;
    const excess = Math.max(0, finalized.length - keep);
    // list is ascending, so the head holds the oldest versions
    const doomed = candidates.slice(0, Math.min(excess, candidates.length));
    const result: PruneResult = { active, removed: [], skipped: [] };

    for (const version of doomed) {
      const outcome = this.removeVersion(version);
      if (outcome.ok) {
        result.removed.push(version);
      } else {
        result.skipped.push({ version, reason: outcome.reason });
      }
    }

    this.logger.info('swap.prune.finish', {
      active: active ? formatVersionTag(active) : null,
      activeOnDisk,
      retainCount: keep,
      removed: result.removed.map(formatVersionTag),
      skipped: result.skipped.map((item) => formatVersionTag(item.version))
    });
    return result;
  }

  /**
   * Renames to the `.del` name first so an interrupted delete never leaves a
   * half-emptied directory under a finalized name.
   */
  private removeVersion(version: VersionTag): { ok: true } | { ok: false; reason: string } {
    const directory = this.versionStore.versionDirectory(version);
    const doomedPath = path.join(this.versionStore.versionsDir, deletingDirectoryName(version));

    try {
      this.rmSync(doomedPath);
      this.renameSync(directory, doomedPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn('swap.prune.delete_failed', {
        version: formatVersionTag(version),
        directory,
        reason
      });
      return { ok: false, reason };
    }

    try {
      this.rmSync(doomedPath);
    } catch (error) {
      // o diretorio ja saiu do nome finalizado; a recuperacao de inicializacao termina a limpeza
      this.logger.warn('swap.prune.delete_deferred', {
        version: formatVersionTag(version),
        directory: doomedPath,
        reason: error instanceof Error ? error.message : String(error)
      });
    }

    return { ok: true };
  }
}

function normalizeRetainCount(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return 2;
  }

  return Math.max(1, Math.trunc(value));
}
