import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LauncherLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

interface LoggerOptions {
  fileName?: string;
  mirrorFilePath?: string | null;
  echo?: ((line: string) => void) | null;
  minEchoLevel?: LogLevel;
  maxBytes?: number;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger implements LauncherLogger {
  private readonly filePath: string;
  private readonly mirrorFilePath: string | null;
  private readonly echo: ((line: string) => void) | null;
  private readonly minEchoLevel: LogLevel;
  private readonly maxBytes: number;

  constructor(baseDir: string, options?: LoggerOptions) {
    const logDir = path.join(baseDir, 'logs');
    fs.mkdirSync(logDir, { recursive: true });
    this.filePath = path.join(logDir, options?.fileName ?? 'launcher.log');
    this.mirrorFilePath = normalizeMirrorPath(options?.mirrorFilePath);
    this.echo = options?.echo ?? null;
    this.minEchoLevel = options?.minEchoLevel ?? 'info';
    this.maxBytes = Number.isFinite(options?.maxBytes) ? Math.max(1024, Math.trunc(options?.maxBytes ?? 0)) : 2 * 1024 * 1024;
    if (this.mirrorFilePath) {
      fs.mkdirSync(path.dirname(this.mirrorFilePath), { recursive: true });
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      meta
    });

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, `${line}\n`);
    if (this.mirrorFilePath) {
      try {
        fs.appendFileSync(this.mirrorFilePath, `${line}\n`);
      } catch {
        // o espelho e opcional; o arquivo principal ja recebeu a linha
      }
    }

    if (this.echo && LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.minEchoLevel]) {
      this.echo(formatEcho(level, message, meta));
    }
  }

  private rotateIfNeeded(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    const stats = fs.statSync(this.filePath);
    if (stats.size < this.maxBytes) {
      return;
    }

    const rotated = `${this.filePath}.1`;
    if (fs.existsSync(rotated)) {
      fs.rmSync(rotated, { force: true });
    }
    fs.renameSync(this.filePath, rotated);
  }
}

function formatEcho(level: LogLevel, message: string, meta: unknown): string {
  const suffix = meta === undefined ? '' : ` ${JSON.stringify(meta)}`;
  return `[launcher] ${level.toUpperCase()} ${message}${suffix}`;
}

function normalizeMirrorPath(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim();
  return normalized ? normalized : null;
}
