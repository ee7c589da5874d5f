import fs from 'node:fs';
import path from 'node:path';
import { spawn, type SpawnOptions } from 'node:child_process';
import type { LauncherErrorCode } from '@shared/contracts';
import type { LauncherLogger } from '@main/services/logging/Logger';

export interface LaunchedChild {
  pid?: number;
  unref(): void;
  once(event: 'spawn' | 'error', listener: (...args: unknown[]) => void): unknown;
}

export type LaunchSpawn = (command: string, args: string[], options: SpawnOptions) => LaunchedChild;

export type ProcessLaunchResult =
  | { ok: true; executablePath: string; pid: number | null }
  | { ok: false; code: Extract<LauncherErrorCode, 'launch_failed'>; reason: string };

interface ProcessLauncherOptions {
  executableName: string;
  logger: LauncherLogger;
  spawnFn?: LaunchSpawn;
  platform?: NodeJS.Platform;
}

export class ProcessLauncher {
  private readonly executableName: string;
  private readonly logger: LauncherLogger;
  private readonly spawnFn: LaunchSpawn;
  private readonly platform: NodeJS.Platform;

  constructor(options: ProcessLauncherOptions) {
    this.executableName = options.executableName;
    this.logger = options.logger;
    this.spawnFn = options.spawnFn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
    this.platform = options.platform ?? process.platform;
  }

  async launch(versionDir: string): Promise<ProcessLaunchResult> {
    const executablePath = findExecutable(versionDir, this.executableName);
    if (!executablePath) {
      return this.failed(versionDir, null, `Executavel ${this.executableName} nao encontrado em ${versionDir}.`);
    }

    if (this.platform !== 'win32') {
      try {
        fs.chmodSync(executablePath, 0o755);
      } catch (error) {
        this.logger.warn('launcher.process.chmod_failed', {
          executablePath,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }

    let child: LaunchedChild;
    try {
      child = this.spawnFn(executablePath, [], {
        cwd: versionDir,
        detached: true,
        stdio: 'ignore',
        windowsHide: false,
        env: {
          ...process.env
        }
      });
    } catch (error) {
      return this.failed(versionDir, executablePath, error instanceof Error ? error.message : String(error));
    }

    const spawnError = await observeChildSpawn(child);
    if (spawnError !== null) {
      return this.failed(versionDir, executablePath, spawnError);
    }

    child.unref();
    const pid = typeof child.pid === 'number' ? child.pid : null;
    this.logger.info('launcher.process.spawned', {
      executablePath,
      cwd: versionDir,
      pid
    });
    return { ok: true, executablePath, pid };
  }

  private failed(versionDir: string, executablePath: string | null, reason: string): ProcessLaunchResult {
    this.logger.error('launcher.process.error', {
      versionDir,
      executablePath,
      reason,
      code: 'launch_failed'
    });
    return { ok: false, code: 'launch_failed', reason };
  }
}

/**
 * Depth-first search for the executable; the payload layout inside the version
 * directory is opaque, so the file may sit below a top-level folder.
 */
export function findExecutable(rootDir: string, fileName: string): string | null {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(rootDir, { withFileTypes: true });
  } catch {
    return null;
  }

  const direct = entries.find((entry) => entry.isFile() && entry.name === fileName);
  if (direct) {
    return path.join(rootDir, direct.name);
  }

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const found = findExecutable(path.join(rootDir, entry.name), fileName);
    if (found) {
      return found;
    }
  }

  return null;
}

function observeChildSpawn(child: LaunchedChild): Promise<string | null> {
  return new Promise((resolve) => {
    let settled = false;
    child.once('error', (error) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(error instanceof Error ? error.message : String(error));
    });
    child.once('spawn', () => {
      if (settled) {
        return;
      }
      settled = true;
      resolve(null);
    });
  });
}
