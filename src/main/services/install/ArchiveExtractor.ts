import { spawn, type SpawnOptions } from 'node:child_process';

export type ArchiveFormat = 'zip' | 'tar.gz';

export interface ArchiveExtractor {
  extract(archivePath: string, destinationDir: string, format: ArchiveFormat): Promise<void>;
}

export interface ExtractorChild {
  once(event: 'close' | 'error', listener: (...args: unknown[]) => void): unknown;
}

export type ExtractorSpawn = (command: string, args: string[], options: SpawnOptions) => ExtractorChild;

interface CommandArchiveExtractorOptions {
  platform?: NodeJS.Platform;
  spawnFn?: ExtractorSpawn;
}

export class CommandArchiveExtractor implements ArchiveExtractor {
  private readonly platform: NodeJS.Platform;
  private readonly spawnFn: ExtractorSpawn;

  constructor(options?: CommandArchiveExtractorOptions) {
    this.platform = options?.platform ?? process.platform;
    this.spawnFn = options?.spawnFn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
  }

  extract(archivePath: string, destinationDir: string, format: ArchiveFormat): Promise<void> {
    const [command, args] = buildCommand(this.platform, archivePath, destinationDir, format);

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error: Error | null) => {
        if (settled) {
          return;
        }
        settled = true;
        if (error) {
          reject(error);
          return;
        }
        resolve();
      };

      try {
        const child = this.spawnFn(command, args, {
          stdio: 'ignore',
          windowsHide: true
        });
        child.once('error', (error) => {
          settle(new Error(`Falha ao executar ${command}: ${error instanceof Error ? error.message : String(error)}`));
        });
        child.once('close', (code) => {
          settle(code === 0 ? null : new Error(`${command} terminou com codigo ${String(code)}.`));
        });
      } catch (error) {
        settle(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }
}

export function inferArchiveFormat(url: string): ArchiveFormat {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // url relativa ou opaca: usa o texto bruto
  }

  const lower = pathname.toLowerCase();
  return lower.endsWith('.tar.gz') || lower.endsWith('.tgz') ? 'tar.gz' : 'zip';
}

export function archiveFileName(format: ArchiveFormat): string {
  return format === 'zip' ? '.package.zip' : '.package.tar.gz';
}

function buildCommand(
  platform: NodeJS.Platform,
  archivePath: string,
  destinationDir: string,
  format: ArchiveFormat
): [string, string[]] {
  if (format === 'tar.gz') {
    return ['tar', ['-xzf', archivePath, '-C', destinationDir]];
  }

  if (platform === 'win32') {
    return [
      'powershell',
      [
        '-NoProfile',
        '-NonInteractive',
        '-Command',
        `Expand-Archive -LiteralPath '${escapePowerShell(archivePath)}' -DestinationPath '${escapePowerShell(destinationDir)}' -Force`
      ]
    ];
  }

  return ['unzip', ['-o', '-q', archivePath, '-d', destinationDir]];
}

function escapePowerShell(value: string): string {
  return value.replace(/'/g, "''");
}
