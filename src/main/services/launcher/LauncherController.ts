import type {
  AutoUpdateMode,
  DownloadProgress,
  LaunchOutcome,
  LauncherEvent,
  LauncherFailure,
  ProgramIdentity,
  UpdateDescriptor,
  VersionTag
} from '@shared/contracts';
import type { LauncherLogger } from '@main/services/logging/Logger';
import type { ArtifactInstaller } from '@main/services/install/ArtifactInstaller';
import type { InstallLock } from '@main/services/install/InstallLock';
import { LauncherStateMachine } from '@main/services/launcher/LauncherStateMachine';
import type { ProcessLauncher } from '@main/services/launcher/ProcessLauncher';
import type { UpdatePrompt } from '@main/services/launcher/UpdatePrompt';
import type { SwapCoordinator } from '@main/services/swap/SwapCoordinator';
import type { UpdateClient } from '@main/services/update/UpdateClient';
import { formatVersionTag } from '@main/services/versions/VersionTag';
import type { VersionStore } from '@main/services/versions/VersionStore';

const DOWNLOAD_PROGRESS_SHARE = 80;

interface LauncherControllerOptions {
  programId: string;
  versionStore: VersionStore;
  updateClient: UpdateClient;
  installer: ArtifactInstaller;
  installLock: InstallLock;
  swapCoordinator: SwapCoordinator;
  processLauncher: ProcessLauncher;
  prompt: UpdatePrompt;
  logger: LauncherLogger;
  autoUpdate?: AutoUpdateMode;
  retainCount?: number;
  onEvent?: (event: LauncherEvent) => void;
}

export class LauncherController {
  private readonly options: LauncherControllerOptions;
  private readonly logger: LauncherLogger;
  private abortController: AbortController | null = null;
  private inFlight = false;

  constructor(options: LauncherControllerOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  /**
   * Aborts an in-flight download. The installer removes the staging directory
   * before run() moves on to launching the previous version.
   */
  cancel(): boolean {
    if (!this.abortController || this.abortController.signal.aborted) {
      return false;
    }

    this.logger.info('launcher.cancel.requested', {
      programId: this.options.programId
    });
    this.abortController.abort();
    return true;
  }

  async run(): Promise<LaunchOutcome> {
    if (this.inFlight) {
      throw new Error('Fluxo do launcher ja esta em andamento.');
    }

    this.inFlight = true;
    this.abortController = new AbortController();
    const machine = new LauncherStateMachine((from, to, detail) => {
      this.logger.debug('launcher.state', { from, to, detail });
      this.options.onEvent?.({ type: 'state', from, to, detail });
    });

    try {
      machine.transition('checking');
      this.emitProgress(0);
      const identity = this.readIdentity();
      const updateFailure = await this.checkAndUpdate(machine, identity);
      machine.transition('launching', updateFailure?.code);
      return await this.launch(machine, updateFailure);
    } finally {
      this.abortController = null;
      this.inFlight = false;
    }
  }

  private readIdentity(): ProgramIdentity {
    const { programId, versionStore } = this.options;
    const current = versionStore.readCurrent(programId);

    if (current.kind === 'corrupt') {
      this.logger.error('version.record.corrupt', {
        programId,
        code: current.code,
        reason: current.reason,
        recordPath: versionStore.recordPath
      });
      return { programId, currentVersion: null };
    }

    if (current.kind === 'not-installed') {
      this.logger.info('version.record.missing', { programId });
      return { programId, currentVersion: null };
    }

    this.logger.info('version.record.loaded', {
      programId,
      version: formatVersionTag(current.version)
    });
    return { programId, currentVersion: current.version };
  }

  private async checkAndUpdate(machine: LauncherStateMachine, identity: ProgramIdentity): Promise<LauncherFailure | null> {
    const check = await this.options.updateClient.checkForUpdate(identity.programId, identity.currentVersion);

    if (check.kind === 'check-failed') {
      machine.transition('check-failed', check.reason);
      return { code: check.code, reason: check.reason };
    }

    if (check.kind === 'up-to-date') {
      machine.transition('up-to-date');
      return null;
    }

    machine.transition('update-available', formatVersionTag(check.descriptor.version));
    const accepted = await this.decide(machine, identity, check.descriptor);
    if (!accepted) {
      return null;
    }

    return this.applyUpdate(machine, identity, check.descriptor);
  }

  private async decide(machine: LauncherStateMachine, identity: ProgramIdentity, descriptor: UpdateDescriptor): Promise<boolean> {
    if (identity.currentVersion === null) {
      machine.transition('accepted', 'first-install');
      return true;
    }

    const mode = this.options.autoUpdate ?? 'prompt';
    if (mode === 'always') {
      machine.transition('accepted', 'auto-update');
      return true;
    }
    if (mode === 'never') {
      machine.transition('declined', 'auto-update-disabled');
      return false;
    }

    machine.transition('prompting');
    let accepted = false;
    try {
      accepted = await this.options.prompt.confirmUpdate({
        programId: identity.programId,
        currentVersion: formatVersionTag(identity.currentVersion),
        latestVersion: formatVersionTag(descriptor.version),
        sizeBytes: descriptor.size
      });
    } catch (error) {
      this.logger.warn('launcher.prompt.error', {
        reason: error instanceof Error ? error.message : String(error)
      });
    }

    machine.transition(accepted ? 'accepted' : 'declined');
    return accepted;
  }

  private async applyUpdate(
    machine: LauncherStateMachine,
    identity: ProgramIdentity,
    descriptor: UpdateDescriptor
  ): Promise<LauncherFailure | null> {
    const { installer, installLock, swapCoordinator, programId } = this.options;

    const lock = installLock.tryAcquire();
    if (lock.status === 'busy') {
      return {
        code: 'install_locked',
        reason: 'Outra instancia do launcher esta instalando uma atualizacao.'
      };
    }
    if (lock.status === 'failed') {
      return {
        code: 'install_failed',
        reason: `Falha ao criar o lock de instalacao: ${lock.reason}`
      };
    }

    try {
      const installed = await installer.install(descriptor, {
        activeVersion: identity.currentVersion,
        signal: this.abortController?.signal,
        onPhase: (phase) => {
          machine.transition(phase);
          if (phase === 'installing') {
            this.emitProgress(85);
          }
        },
        onProgress: (progress) => this.emitDownloadProgress(progress)
      });
      if (!installed.ok) {
        return { code: installed.code, reason: installed.reason };
      }

      machine.transition('promoting', installed.reused ? 'reused' : undefined);
      this.emitProgress(92);
      const promoted = swapCoordinator.promote(programId, installed.version);
      if (!promoted.ok) {
        return { code: promoted.code, reason: promoted.reason };
      }

      machine.transition('cleaning');
      this.emitProgress(98);
      this.pruneAfterPromotion();
      return null;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('launcher.update.error', {
        programId,
        version: formatVersionTag(descriptor.version),
        reason
      });
      return { code: 'install_failed', reason };
    } finally {
      installLock.release();
    }
  }

  // a versao nova ja esta ativa; falha na limpeza nao desfaz a atualizacao
  private pruneAfterPromotion(): void {
    const { swapCoordinator, programId, retainCount } = this.options;
    try {
      swapCoordinator.pruneOldVersions(programId, retainCount);
    } catch (error) {
      this.logger.warn('swap.prune.error', {
        programId,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private async launch(machine: LauncherStateMachine, updateFailure: LauncherFailure | null): Promise<LaunchOutcome> {
    const target = this.resolveLaunchTarget();
    if (!target) {
      const reason = 'Nenhuma versao instalada disponivel para executar.';
      this.logger.error('launcher.launch.error', { code: 'launch_failed', reason });
      machine.transition('launch-failed', reason);
      return {
        state: 'launch-failed',
        version: null,
        code: 'launch_failed',
        reason,
        updateFailure,
        history: machine.history
      };
    }

    const launched = await this.options.processLauncher.launch(target.directory);
    if (!launched.ok) {
      machine.transition('launch-failed', launched.reason);
      return {
        state: 'launch-failed',
        version: target.version,
        code: launched.code,
        reason: launched.reason,
        updateFailure,
        history: machine.history
      };
    }

    machine.transition('running');
    this.emitProgress(100);
    this.logger.info('launcher.launch.finish', {
      version: formatVersionTag(target.version),
      executablePath: launched.executablePath,
      pid: launched.pid,
      updateFailure: updateFailure?.code ?? null
    });
    return {
      state: 'running',
      version: target.version,
      executablePath: launched.executablePath,
      pid: launched.pid,
      updateFailure,
      history: machine.history
    };
  }

  private resolveLaunchTarget(): { version: VersionTag; directory: string } | null {
    const { versionStore, programId } = this.options;
    const current = versionStore.readCurrent(programId);
    if (current.kind === 'installed' && versionStore.hasFinalized(current.version)) {
      return { version: current.version, directory: versionStore.versionDirectory(current.version) };
    }

    const newest = versionStore.listVersionDirectories().at(-1);
    if (!newest) {
      return null;
    }

    this.logger.warn('launcher.launch.fallback_directory', {
      record: current.kind,
      recordVersion: current.kind === 'installed' ? formatVersionTag(current.version) : null,
      fallbackVersion: formatVersionTag(newest)
    });
    return { version: newest, directory: versionStore.versionDirectory(newest) };
  }

  private emitDownloadProgress(progress: DownloadProgress): void {
    const percent =
      progress.totalBytes > 0
        ? Math.min(DOWNLOAD_PROGRESS_SHARE, Math.floor((progress.receivedBytes / progress.totalBytes) * DOWNLOAD_PROGRESS_SHARE))
        : 0;
    this.options.onEvent?.({
      type: 'progress',
      percent,
      receivedBytes: progress.receivedBytes,
      totalBytes: progress.totalBytes
    });
  }

  private emitProgress(percent: number): void {
    this.options.onEvent?.({ type: 'progress', percent });
  }
}
