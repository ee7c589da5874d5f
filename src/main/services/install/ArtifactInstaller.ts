import fs from 'node:fs';
import path from 'node:path';
import type { DownloadProgress, InstallPhase, LauncherErrorCode, UpdateDescriptor, VersionTag } from '@shared/contracts';
import type { LauncherLogger } from '@main/services/logging/Logger';
import { archiveFileName, inferArchiveFormat, type ArchiveExtractor } from '@main/services/install/ArchiveExtractor';
import {
  DownloadSizeExceededError,
  type ArtifactDownloader,
  type DownloadedArtifact
} from '@main/services/install/ArtifactDownloader';
import { formatVersionTag, sameVersionTag } from '@main/services/versions/VersionTag';
import type { VersionStore } from '@main/services/versions/VersionStore';

export type InstallStep = 'stage' | 'download' | 'verify' | 'expand' | 'finalize';

export type InstallResult =
  | { ok: true; version: VersionTag; directory: string; reused: boolean; bytes: number }
  | {
      ok: false;
      code: Extract<LauncherErrorCode, 'verification_failed' | 'install_failed' | 'install_cancelled'>;
      step: InstallStep;
      reason: string;
    };

export interface InstallRequest {
  activeVersion: VersionTag | null;
  signal?: AbortSignal;
  onPhase?: (phase: InstallPhase) => void;
  onProgress?: (progress: DownloadProgress) => void;
}

export interface InstallerFileSystem {
  mkdirSync(target: string): void;
  rmSync(target: string): void;
  renameSync(from: string, to: string): void;
  existsSync(target: string): boolean;
}

interface ArtifactInstallerOptions {
  versionStore: VersionStore;
  downloader: ArtifactDownloader;
  extractor: ArchiveExtractor;
  logger: LauncherLogger;
  fileSystem?: Partial<InstallerFileSystem>;
}

const nodeFileSystem: InstallerFileSystem = {
  mkdirSync: (target) => {
    fs.mkdirSync(target, { recursive: true });
  },
  rmSync: (target) => {
    fs.rmSync(target, { recursive: true, force: true });
  },
  renameSync: (from, to) => {
    fs.renameSync(from, to);
  },
  existsSync: (target) => fs.existsSync(target)
};

export class ArtifactInstaller {
  private readonly versionStore: VersionStore;
  private readonly downloader: ArtifactDownloader;
  private readonly extractor: ArchiveExtractor;
  private readonly logger: LauncherLogger;
  private readonly fileSystem: InstallerFileSystem;

  constructor(options: ArtifactInstallerOptions) {
    this.versionStore = options.versionStore;
    this.downloader = options.downloader;
    this.extractor = options.extractor;
    this.logger = options.logger;
    this.fileSystem = { ...nodeFileSystem, ...options.fileSystem };
  }

  async install(descriptor: UpdateDescriptor, request: InstallRequest): Promise<InstallResult> {
    const version = descriptor.version;
    const versionText = formatVersionTag(version);
    const finalDir = this.versionStore.versionDirectory(version);

    if (this.versionStore.hasFinalized(version)) {
      this.logger.info('install.reuse_finalized', {
        version: versionText,
        directory: finalDir
      });
      return { ok: true, version, directory: finalDir, reused: true, bytes: 0 };
    }

    const stagingDir = this.versionStore.stagingDirectory(version);
    this.logger.info('install.start', {
      version: versionText,
      stagingDir,
      size: descriptor.size
    });

    try {
      this.fileSystem.rmSync(stagingDir);
      this.fileSystem.mkdirSync(stagingDir);
    } catch (error) {
      return this.fail(stagingDir, versionText, 'stage', 'install_failed', `Falha ao preparar staging: ${describeError(error)}`);
    }

    const format = inferArchiveFormat(descriptor.downloadUrl);
    const archivePath = path.join(stagingDir, archiveFileName(format));

    request.onPhase?.('downloading');
    let artifact: DownloadedArtifact;
    try {
      artifact = await this.downloader.download({
        url: descriptor.downloadUrl,
        destinationPath: archivePath,
        expectedSize: descriptor.size,
        signal: request.signal,
        onProgress: request.onProgress
      });
    } catch (error) {
      if (request.signal?.aborted) {
        return this.fail(stagingDir, versionText, 'download', 'install_cancelled', 'Download cancelado pelo usuario.');
      }
      if (error instanceof DownloadSizeExceededError) {
        request.onPhase?.('verifying');
        return this.fail(stagingDir, versionText, 'verify', 'verification_failed', error.message);
      }
      return this.fail(stagingDir, versionText, 'download', 'install_failed', `Falha no download: ${describeError(error)}`);
    }

    request.onPhase?.('verifying');
    if (artifact.bytes !== descriptor.size) {
      return this.fail(
        stagingDir,
        versionText,
        'verify',
        'verification_failed',
        `Tamanho do pacote nao confere: esperado ${descriptor.size}, recebido ${artifact.bytes}.`
      );
    }
    if (artifact.sha256.toLowerCase() !== descriptor.sha256.toLowerCase()) {
      return this.fail(stagingDir, versionText, 'verify', 'verification_failed', 'Checksum SHA256 do pacote nao confere com o servidor.');
    }

    request.onPhase?.('installing');
    try {
      await this.extractor.extract(archivePath, stagingDir, format);
      this.fileSystem.rmSync(archivePath);
    } catch (error) {
      return this.fail(stagingDir, versionText, 'expand', 'install_failed', `Falha ao extrair pacote: ${describeError(error)}`);
    }

    const finalized = this.finalize(stagingDir, finalDir, version, request.activeVersion);
    if (!finalized.ok) {
      return this.fail(stagingDir, versionText, 'finalize', 'install_failed', finalized.reason);
    }

    this.logger.info('install.finish', {
      version: versionText,
      directory: finalDir,
      bytes: artifact.bytes
    });
    return { ok: true, version, directory: finalDir, reused: false, bytes: artifact.bytes };
  }

  /**
   * The rename below is the commit point from untrusted to trusted. One retry is
   * allowed after clearing a stale target that is not the active version.
   */
  private finalize(
    stagingDir: string,
    finalDir: string,
    version: VersionTag,
    activeVersion: VersionTag | null
  ): { ok: true } | { ok: false; reason: string } {
    try {
      this.fileSystem.renameSync(stagingDir, finalDir);
      return { ok: true };
    } catch (firstError) {
      this.logger.warn('install.finalize.retry', {
        version: formatVersionTag(version),
        reason: describeError(firstError)
      });

      if (this.fileSystem.existsSync(finalDir)) {
        if (sameVersionTag(version, activeVersion)) {
          return { ok: false, reason: 'Destino final pertence a versao ativa; nao sera removido.' };
        }
        try {
          this.fileSystem.rmSync(finalDir);
        } catch (error) {
          return { ok: false, reason: `Falha ao remover destino obsoleto: ${describeError(error)}` };
        }
      }

      try {
        this.fileSystem.renameSync(stagingDir, finalDir);
        return { ok: true };
      } catch (secondError) {
        return { ok: false, reason: `Falha ao finalizar instalacao: ${describeError(secondError)}` };
      }
    }
  }

  private fail(
    stagingDir: string,
    version: string,
    step: InstallStep,
    code: Extract<LauncherErrorCode, 'verification_failed' | 'install_failed' | 'install_cancelled'>,
    reason: string
  ): InstallResult {
    let cleaned = true;
    try {
      this.fileSystem.rmSync(stagingDir);
    } catch (error) {
      cleaned = false;
      this.logger.warn('install.cleanup_failed', {
        version,
        stagingDir,
        reason: describeError(error)
      });
    }

    const meta = { version, code, reason, stagingCleaned: cleaned };
    if (code === 'install_cancelled') {
      this.logger.info('install.cancelled', meta);
    } else {
      this.logger.error(`install.${step}.error`, meta);
    }

    return { ok: false, code, step, reason };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
