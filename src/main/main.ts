import path from 'node:path';
import type { AutoUpdateMode, LaunchOutcome, LauncherConfig, LauncherEvent } from '@shared/contracts';
import { LauncherConfigStore } from '@main/services/config/LauncherConfigStore';
import { CommandArchiveExtractor } from '@main/services/install/ArchiveExtractor';
import { HttpArtifactDownloader } from '@main/services/install/ArtifactDownloader';
import { ArtifactInstaller } from '@main/services/install/ArtifactInstaller';
import { InstallLock } from '@main/services/install/InstallLock';
import { LauncherController } from '@main/services/launcher/LauncherController';
import { ProcessLauncher } from '@main/services/launcher/ProcessLauncher';
import { StartupRecovery } from '@main/services/launcher/StartupRecovery';
import { ConsoleUpdatePrompt, FixedUpdatePrompt, type UpdatePrompt } from '@main/services/launcher/UpdatePrompt';
import { Logger } from '@main/services/logging/Logger';
import { HttpNoticeClient } from '@main/services/notices/HttpNoticeClient';
import { NoticeAckStore } from '@main/services/notices/NoticeAckStore';
import { NoticeService } from '@main/services/notices/NoticeService';
import { SwapCoordinator } from '@main/services/swap/SwapCoordinator';
import { HttpUpdateClient } from '@main/services/update/HttpUpdateClient';
import { formatVersionTag } from '@main/services/versions/VersionTag';
import { VersionStore } from '@main/services/versions/VersionStore';

function resolveBaseDir(): string {
  const fromEnv = process.env.LAUNCHER_HOME?.trim();
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  // empacotado como executavel unico: os dados ficam ao lado do binario
  const runtime = path.basename(process.execPath).toLowerCase();
  if (runtime !== 'node' && runtime !== 'node.exe') {
    return path.dirname(process.execPath);
  }

  return process.cwd();
}

function applyEnvOverrides(config: LauncherConfig): LauncherConfig {
  const serverUrl = process.env.LAUNCHER_SERVER_URL?.trim();
  const autoUpdate = parseAutoUpdateMode(process.env.LAUNCHER_AUTO_UPDATE);

  return {
    ...config,
    serverUrl: serverUrl || config.serverUrl,
    autoUpdate: autoUpdate ?? config.autoUpdate
  };
}

function parseAutoUpdateMode(value: string | undefined): AutoUpdateMode | null {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'prompt' || normalized === 'always' || normalized === 'never') {
    return normalized;
  }

  return null;
}

function isTruthyEnv(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

function renderEvent(event: LauncherEvent): void {
  if (event.type === 'progress') {
    const bytes =
      event.totalBytes !== undefined && event.receivedBytes !== undefined
        ? ` (${event.receivedBytes}/${event.totalBytes} bytes)`
        : '';
    process.stderr.write(`\r[${String(event.percent).padStart(3)}%]${bytes}   `);
    if (event.percent >= 100) {
      process.stderr.write('\n');
    }
  }
}

function reportOutcome(outcome: LaunchOutcome, config: LauncherConfig): number {
  if (outcome.updateFailure) {
    process.stderr.write(`\nAtualizacao nao aplicada (${outcome.updateFailure.code}): ${outcome.updateFailure.reason}\n`);
  }

  if (outcome.state === 'running') {
    process.stderr.write(`\nVersao ${formatVersionTag(outcome.version)} iniciada (pid ${outcome.pid ?? '?'}).\n`);
    return 0;
  }

  const lines = [
    '',
    `Nao foi possivel iniciar o programa: ${outcome.reason}`,
    'Reinstale o programa para corrigir a instalacao.'
  ];
  if (config.support) {
    lines.push(`Site: ${config.support.siteUrl}`, `Duvidas: ${config.support.qnaUrl}`);
  }
  process.stderr.write(`${lines.join('\n')}\n`);
  return 1;
}

async function main(): Promise<number> {
  const baseDir = resolveBaseDir();
  const logger = new Logger(baseDir, {
    mirrorFilePath: process.env.LAUNCHER_LOG_MIRROR_PATH ?? null,
    echo: isTruthyEnv(process.env.LAUNCHER_LOG_STDERR) ? (line) => process.stderr.write(`${line}\n`) : null
  });
  const config = applyEnvOverrides(new LauncherConfigStore(baseDir).get());
  logger.info('launcher.start', {
    baseDir,
    programId: config.programId,
    serverUrl: config.serverUrl,
    autoUpdate: config.autoUpdate
  });

  const versionStore = new VersionStore({ baseDir });
  const installLock = new InstallLock({
    versionsDir: versionStore.versionsDir,
    logger,
    staleAfterMs: config.lockStaleAfterMs
  });
  new StartupRecovery({ versionStore, installLock, logger }).recover();

  const interactive = Boolean(process.stdin.isTTY);
  const prompt: UpdatePrompt = interactive
    ? new ConsoleUpdatePrompt({ input: process.stdin, output: process.stderr })
    : new FixedUpdatePrompt(false);

  const notices = new NoticeService(
    new HttpNoticeClient({ serverUrl: config.serverUrl, timeoutMs: config.requestTimeoutMs }),
    new NoticeAckStore(baseDir),
    logger
  );
  const notice = await notices.nextNotice(config.programId);
  if (notice && prompt.showNotice) {
    notices.acknowledge(notice, await prompt.showNotice(notice));
  }

  const controller = new LauncherController({
    programId: config.programId,
    versionStore,
    updateClient: new HttpUpdateClient({
      serverUrl: config.serverUrl,
      logger,
      timeoutMs: config.requestTimeoutMs
    }),
    installer: new ArtifactInstaller({
      versionStore,
      downloader: new HttpArtifactDownloader(),
      extractor: new CommandArchiveExtractor(),
      logger
    }),
    installLock,
    swapCoordinator: new SwapCoordinator({ versionStore, logger, retainCount: config.retainCount }),
    processLauncher: new ProcessLauncher({ executableName: config.executableName, logger }),
    prompt,
    logger,
    autoUpdate: interactive ? config.autoUpdate : config.autoUpdate === 'always' ? 'always' : 'never',
    retainCount: config.retainCount,
    onEvent: renderEvent
  });

  const onSigint = (): void => {
    if (!controller.cancel()) {
      process.exit(130);
    }
  };
  process.on('SIGINT', onSigint);
  try {
    return reportOutcome(await controller.run(), config);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Falha inesperada no launcher: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
