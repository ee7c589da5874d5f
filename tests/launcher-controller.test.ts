import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { AutoUpdateMode, LauncherEvent, UpdateCheckResult, VersionTag } from '@shared/contracts';
import { ArtifactInstaller } from '@main/services/install/ArtifactInstaller';
import { InstallLock } from '@main/services/install/InstallLock';
import { LauncherController } from '@main/services/launcher/LauncherController';
import { ProcessLauncher } from '@main/services/launcher/ProcessLauncher';
import { FixedUpdatePrompt, type UpdatePrompt } from '@main/services/launcher/UpdatePrompt';
import { SwapCoordinator } from '@main/services/swap/SwapCoordinator';
import { formatVersionTag } from '@main/services/versions/VersionTag';
import { VersionStore } from '@main/services/versions/VersionStore';
import {
  descriptorFor,
  JsonArchiveExtractor,
  makeLogger,
  packagePayload,
  PayloadDownloader,
  succeedingSpawn
} from './support/launcher-fakes';

const tempDirs: string[] = [];
const V100 = { major: 1, minor: 0, patch: 0 };
const V110 = { major: 1, minor: 1, patch: 0 };
const V120 = { major: 1, minor: 2, patch: 0 };

afterEach(() => {
  vi.restoreAllMocks();

  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

interface HarnessOptions {
  check: UpdateCheckResult;
  payload?: Buffer;
  installed?: VersionTag[];
  current?: VersionTag;
  autoUpdate?: AutoUpdateMode;
  prompt?: UpdatePrompt;
  downloaderChunkSize?: number;
  baseDir?: string;
  onEvent?: (event: LauncherEvent) => void;
}

function makeHarness(options: HarnessOptions) {
  const baseDir = options.baseDir ?? fs.mkdtempSync(path.join(os.tmpdir(), 'launcher-controller-'));
  if (!options.baseDir) {
    tempDirs.push(baseDir);
  }

  const versionStore = new VersionStore({ baseDir });
  for (const version of options.installed ?? []) {
    fs.mkdirSync(versionStore.versionDirectory(version), { recursive: true });
    fs.writeFileSync(path.join(versionStore.versionDirectory(version), 'program'), formatVersionTag(version));
  }
  if (options.current) {
    versionStore.writeCurrent('program', options.current);
  }

  const logger = makeLogger();
  const updateClient = { checkForUpdate: vi.fn(async () => options.check) };
  const downloader = new PayloadDownloader(options.payload ?? Buffer.alloc(0), { chunkSize: options.downloaderChunkSize });
  const spawnFn = succeedingSpawn();
  const installLock = new InstallLock({ versionsDir: versionStore.versionsDir, logger, isProcessAlive: () => true });
  const events: LauncherEvent[] = [];

  const controller = new LauncherController({
    programId: 'program',
    versionStore,
    updateClient,
    installer: new ArtifactInstaller({ versionStore, downloader, extractor: new JsonArchiveExtractor(), logger }),
    installLock,
    swapCoordinator: new SwapCoordinator({ versionStore, logger }),
    processLauncher: new ProcessLauncher({ executableName: 'program', logger, spawnFn }),
    prompt: options.prompt ?? new FixedUpdatePrompt(true),
    logger,
    autoUpdate: options.autoUpdate,
    onEvent: (event) => {
      events.push(event);
      options.onEvent?.(event);
    }
  });

  return { baseDir, controller, versionStore, updateClient, downloader, spawnFn, installLock, logger, events };
}

function available(version: VersionTag, payload: Buffer): UpdateCheckResult {
  return { kind: 'update-available', descriptor: descriptorFor(version, payload) };
}

function snapshotDisk(store: VersionStore): { record: string; recordMtime: number; entries: string[] } {
  return {
    record: fs.readFileSync(store.recordPath, 'utf-8'),
    recordMtime: fs.statSync(store.recordPath).mtimeMs,
    entries: [...fs.readdirSync(store.dataDir), ...fs.readdirSync(store.versionsDir)].sort()
  };
}

describe('LauncherController', () => {
  it('instala a primeira versao sem perguntar e inicia o programa', async () => {
    const payload = packagePayload({ program: '#!/bin/sh\necho 1.0.0\n' });
    const prompt = { confirmUpdate: vi.fn(async () => false) };
    const harness = makeHarness({ check: available(V100, payload), payload, prompt });

    const outcome = await harness.controller.run();

    const executablePath = path.join(harness.versionStore.versionDirectory(V100), 'program');
    expect(outcome).toEqual({
      state: 'running',
      version: V100,
      executablePath,
      pid: 4_000,
      updateFailure: null,
      history: [
        'idle',
        'checking',
        'update-available',
        'accepted',
        'downloading',
        'verifying',
        'installing',
        'promoting',
        'cleaning',
        'launching',
        'running'
      ]
    });
    expect(prompt.confirmUpdate).not.toHaveBeenCalled();
    expect(harness.updateClient.checkForUpdate).toHaveBeenCalledWith('program', null);
    expect(harness.versionStore.readCurrent('program')).toEqual({ kind: 'installed', version: V100 });
    expect(harness.spawnFn).toHaveBeenCalledWith(executablePath, [], expect.objectContaining({ cwd: path.dirname(executablePath) }));
    expect(fs.existsSync(harness.installLock.lockPath)).toBe(false);
    expect(
      harness.events.flatMap((event) => (event.type === 'progress' ? [event.percent] : []))
    ).toEqual([0, 80, 85, 92, 98, 100]);
  });

  it('atualiza com confirmacao e mantem apenas duas versoes', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const prompt = { confirmUpdate: vi.fn(async () => true) };
    const harness = makeHarness({
      check: available(V120, payload),
      payload,
      installed: [V100, V110],
      current: V110,
      prompt
    });

    const outcome = await harness.controller.run();

    expect(outcome.state).toBe('running');
    expect(outcome.version).toEqual(V120);
    expect(prompt.confirmUpdate).toHaveBeenCalledWith({
      programId: 'program',
      currentVersion: '1.1.0',
      latestVersion: '1.2.0',
      sizeBytes: payload.length
    });
    expect(outcome.history).toContain('prompting');
    expect(harness.versionStore.listVersionDirectories()).toEqual([V110, V120]);
    expect(harness.versionStore.readCurrent('program')).toEqual({ kind: 'installed', version: V120 });
  });

  it('segunda execucao atualizada nao altera nada em disco', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const first = makeHarness({ check: available(V120, payload), payload, installed: [V110], current: V110, autoUpdate: 'always' });
    await first.controller.run();
    const before = snapshotDisk(first.versionStore);

    const second = makeHarness({ check: { kind: 'up-to-date' }, baseDir: first.baseDir });
    const outcome = await second.controller.run();

    expect(outcome.state).toBe('running');
    expect(outcome.version).toEqual(V120);
    expect(outcome.history).toEqual(['idle', 'checking', 'up-to-date', 'launching', 'running']);
    expect(second.downloader.requests).toHaveLength(0);
    expect(snapshotDisk(second.versionStore)).toEqual(before);
  });

  it('trata registro corrompido como instalacao ausente', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const harness = makeHarness({ check: available(V120, payload), payload, installed: [V110], autoUpdate: 'never' });
    fs.writeFileSync(harness.versionStore.recordPath, '{"programId": "program", "version": ', 'utf-8');

    const outcome = await harness.controller.run();

    expect(harness.logger.error).toHaveBeenCalledWith(
      'version.record.corrupt',
      expect.objectContaining({ code: 'corrupt_record', recordPath: harness.versionStore.recordPath })
    );
    expect(harness.updateClient.checkForUpdate).toHaveBeenCalledWith('program', null);
    expect(outcome.state).toBe('running');
    expect(outcome.version).toEqual(V120);
    expect(harness.versionStore.readCurrent('program')).toEqual({ kind: 'installed', version: V120 });
  });

  it('executa a versao atual quando a consulta falha', async () => {
    const harness = makeHarness({
      check: { kind: 'check-failed', code: 'check_failed', reason: 'HTTP 503' },
      installed: [V110],
      current: V110
    });

    const outcome = await harness.controller.run();

    expect(outcome).toMatchObject({
      state: 'running',
      version: V110,
      updateFailure: { code: 'check_failed', reason: 'HTTP 503' },
      history: ['idle', 'checking', 'check-failed', 'launching', 'running']
    });
  });

  it('mantem a versao atual quando o usuario recusa', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const harness = makeHarness({
      check: available(V120, payload),
      payload,
      installed: [V110],
      current: V110,
      prompt: new FixedUpdatePrompt(false)
    });

    const outcome = await harness.controller.run();

    expect(outcome.version).toEqual(V110);
    expect(outcome.updateFailure).toBeNull();
    expect(outcome.history).toEqual(['idle', 'checking', 'update-available', 'prompting', 'declined', 'launching', 'running']);
    expect(harness.downloader.requests).toHaveLength(0);
  });

  it('trata erro no prompt como recusa', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const prompt = {
      confirmUpdate: vi.fn(async (): Promise<boolean> => {
        throw new Error('stdin fechado');
      })
    };
    const harness = makeHarness({ check: available(V120, payload), payload, installed: [V110], current: V110, prompt });

    const outcome = await harness.controller.run();

    expect(outcome.version).toEqual(V110);
    expect(outcome.history).toContain('declined');
    expect(harness.logger.warn).toHaveBeenCalledWith('launcher.prompt.error', { reason: 'stdin fechado' });
  });

  it('respeita autoUpdate never sem perguntar', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const prompt = { confirmUpdate: vi.fn(async () => true) };
    const harness = makeHarness({
      check: available(V120, payload),
      payload,
      installed: [V110],
      current: V110,
      autoUpdate: 'never',
      prompt
    });

    const outcome = await harness.controller.run();

    expect(outcome.version).toEqual(V110);
    expect(prompt.confirmUpdate).not.toHaveBeenCalled();
  });

  it('nao instala enquanto outra instancia segura o lock', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const harness = makeHarness({ check: available(V120, payload), payload, installed: [V110], current: V110, autoUpdate: 'always' });
    const other = new InstallLock({ versionsDir: harness.versionStore.versionsDir, logger: makeLogger(), pid: process.pid + 1 });
    expect(other.tryAcquire().status).toBe('held');

    const outcome = await harness.controller.run();

    expect(outcome.version).toEqual(V110);
    expect(outcome.updateFailure).toEqual({
      code: 'install_locked',
      reason: 'Outra instancia do launcher esta instalando uma atualizacao.'
    });
    expect(harness.downloader.requests).toHaveLength(0);
    expect(fs.existsSync(other.lockPath)).toBe(true);
  });

  it('executa a versao anterior quando o lock nao pode ser gravado', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const harness = makeHarness({ check: available(V120, payload), payload, installed: [V110], current: V110, autoUpdate: 'always' });
    const writeFileSync = fs.writeFileSync;
    vi.spyOn(fs, 'writeFileSync').mockImplementation((file, data, options) => {
      if (String(file).endsWith('.install.lock')) {
        throw Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });
      }
      writeFileSync(file, data, options);
    });

    const outcome = await harness.controller.run();

    expect(outcome).toMatchObject({
      state: 'running',
      version: V110,
      updateFailure: {
        code: 'install_failed',
        reason: 'Falha ao criar o lock de instalacao: ENOSPC: no space left on device'
      }
    });
    expect(outcome.history.slice(-3)).toEqual(['accepted', 'launching', 'running']);
    expect(harness.downloader.requests).toHaveLength(0);
    expect(harness.logger.error).toHaveBeenCalledWith('install.lock.error', {
      lockPath: harness.installLock.lockPath,
      reason: 'ENOSPC: no space left on device'
    });
  });

  it('mantem a versao promovida quando a limpeza falha', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const harness = makeHarness({ check: available(V120, payload), payload, installed: [V100, V110], current: V110, autoUpdate: 'always' });
    vi.spyOn(SwapCoordinator.prototype, 'pruneOldVersions').mockImplementation(() => {
      throw new Error('EIO: i/o error, scandir');
    });

    const outcome = await harness.controller.run();

    expect(outcome).toMatchObject({ state: 'running', version: V120, updateFailure: null });
    expect(outcome.history.slice(-3)).toEqual(['cleaning', 'launching', 'running']);
    expect(harness.versionStore.readCurrent('program')).toEqual({ kind: 'installed', version: V120 });
    expect(harness.versionStore.listVersionDirectories()).toEqual([V100, V110, V120]);
    expect(harness.logger.warn).toHaveBeenCalledWith('swap.prune.error', {
      programId: 'program',
      reason: 'EIO: i/o error, scandir'
    });
    expect(fs.existsSync(harness.installLock.lockPath)).toBe(false);
  });

  it('executa a versao anterior quando a verificacao falha', async () => {
    const payload = packagePayload({ program: '1.2.0' });
    const harness = makeHarness({
      check: { kind: 'update-available', descriptor: descriptorFor(V120, payload, { sha256: 'f'.repeat(64) }) },
      payload,
      installed: [V110],
      current: V110,
      autoUpdate: 'always'
    });

    const outcome = await harness.controller.run();

    expect(outcome).toMatchObject({
      state: 'running',
      version: V110,
      updateFailure: { code: 'verification_failed', reason: 'Checksum SHA256 do pacote nao confere com o servidor.' }
    });
    expect(outcome.history.slice(-4)).toEqual(['downloading', 'verifying', 'launching', 'running']);
    expect(fs.readdirSync(harness.versionStore.versionsDir)).toEqual(['v1_1_0']);
    expect(harness.versionStore.readCurrent('program')).toEqual({ kind: 'installed', version: V110 });
  });

  it('cancela o download e executa a versao anterior', async () => {
    const payload = Buffer.alloc(8192, 2);
    let cancel = (): boolean => false;
    const harness = makeHarness({
      check: available(V120, payload),
      payload,
      installed: [V110],
      current: V110,
      autoUpdate: 'always',
      downloaderChunkSize: 1024,
      onEvent: (event) => {
        if (event.type === 'progress' && event.receivedBytes !== undefined) {
          cancel();
        }
      }
    });
    cancel = () => harness.controller.cancel();

    const outcome = await harness.controller.run();

    expect(outcome.version).toEqual(V110);
    expect(outcome.updateFailure).toEqual({ code: 'install_cancelled', reason: 'Download cancelado pelo usuario.' });
    expect(fs.readdirSync(harness.versionStore.versionsDir)).toEqual(['v1_1_0']);
    expect(harness.controller.cancel()).toBe(false);
  });

  it('usa o diretorio finalizado mais novo quando o registro aponta para pasta ausente', async () => {
    const harness = makeHarness({
      check: { kind: 'check-failed', code: 'check_failed', reason: 'offline' },
      installed: [V100, V110, V120],
      current: V120
    });
    fs.rmSync(harness.versionStore.versionDirectory(V120), { recursive: true, force: true });

    const outcome = await harness.controller.run();

    expect(outcome.version).toEqual(V110);
    expect(harness.logger.warn).toHaveBeenCalledWith('launcher.launch.fallback_directory', {
      record: 'installed',
      recordVersion: '1.2.0',
      fallbackVersion: '1.1.0'
    });
  });

  it('falha ao iniciar quando nao ha nenhuma versao instalada', async () => {
    const harness = makeHarness({ check: { kind: 'check-failed', code: 'check_failed', reason: 'offline' } });

    const outcome = await harness.controller.run();

    expect(outcome).toEqual({
      state: 'launch-failed',
      version: null,
      code: 'launch_failed',
      reason: 'Nenhuma versao instalada disponivel para executar.',
      updateFailure: { code: 'check_failed', reason: 'offline' },
      history: ['idle', 'checking', 'check-failed', 'launching', 'launch-failed']
    });
    expect(harness.spawnFn).not.toHaveBeenCalled();
  });

  it('recusa execucoes simultaneas', async () => {
    const harness = makeHarness({ check: { kind: 'up-to-date' }, installed: [V110], current: V110 });

    const running = harness.controller.run();
    await expect(harness.controller.run()).rejects.toThrow('Fluxo do launcher ja esta em andamento.');
    await expect(running).resolves.toMatchObject({ state: 'running' });
  });
});
