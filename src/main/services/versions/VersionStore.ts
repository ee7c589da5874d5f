import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { CurrentVersionReadResult, CurrentVersionRecord, VersionTag } from '@shared/contracts';
import {
  compareVersionTags,
  formatVersionTag,
  parseVersionDirectoryName,
  parseVersionTag,
  stagingDirectoryName,
  versionTagToDirectoryName
} from '@main/services/versions/VersionTag';

const recordSchema = z.object({
  programId: z.string().trim().min(1),
  version: z.string().trim().min(1),
  updatedAt: z.string().datetime().optional()
});

interface VersionStoreOptions {
  baseDir: string;
  renameSync?: (from: string, to: string) => void;
  writeFileSync?: (filePath: string, data: string) => void;
}

export class VersionStore {
  readonly dataDir: string;
  readonly versionsDir: string;
  readonly recordPath: string;
  private readonly renameSync: (from: string, to: string) => void;
  private readonly writeFileSync: (filePath: string, data: string) => void;

  constructor(options: VersionStoreOptions) {
    this.dataDir = path.join(options.baseDir, 'data');
    this.versionsDir = path.join(options.baseDir, 'versions');
    fs.mkdirSync(this.dataDir, { recursive: true });
    fs.mkdirSync(this.versionsDir, { recursive: true });
    this.recordPath = path.join(this.dataDir, 'current.json');
    this.renameSync = options.renameSync ?? fs.renameSync;
    this.writeFileSync = options.writeFileSync ?? ((filePath, data) => fs.writeFileSync(filePath, data, 'utf-8'));
  }

  get recordTempPath(): string {
    return `${this.recordPath}.tmp`;
  }

  readCurrent(programId: string): CurrentVersionReadResult {
    if (!fs.existsSync(this.recordPath)) {
      return { kind: 'not-installed' };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.recordPath, 'utf-8'));
    } catch (error) {
      return {
        kind: 'corrupt',
        code: 'corrupt_record',
        reason: `current.json ilegivel: ${error instanceof Error ? error.message : String(error)}`
      };
    }

    const parsed = recordSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        kind: 'corrupt',
        code: 'corrupt_record',
        reason: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      };
    }

    const version = parseVersionTag(parsed.data.version);
    if (!version) {
      return {
        kind: 'corrupt',
        code: 'corrupt_record',
        reason: `versao invalida em current.json: ${parsed.data.version}`
      };
    }

    if (parsed.data.programId !== programId) {
      return { kind: 'not-installed' };
    }

    return { kind: 'installed', version };
  }

  /**
   * Replaces current.json through a temp file and a single rename; a crash leaves
   * either the previous record or the new one, never a partial file.
   */
  writeCurrent(programId: string, version: VersionTag): CurrentVersionRecord {
    if (!this.hasFinalized(version)) {
      throw new Error(`Diretorio finalizado ausente para ${formatVersionTag(version)}.`);
    }

    const record: CurrentVersionRecord = {
      programId,
      version: formatVersionTag(version),
      updatedAt: new Date().toISOString()
    };

    const tempPath = this.recordTempPath;
    try {
      this.writeFileSync(tempPath, `${JSON.stringify(record, null, 2)}\n`);
      this.renameSync(tempPath, this.recordPath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }

    return record;
  }

  listVersionDirectories(): VersionTag[] {
    if (!fs.existsSync(this.versionsDir)) {
      return [];
    }

    return fs
      .readdirSync(this.versionsDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => parseVersionDirectoryName(entry.name))
      .filter((tag): tag is VersionTag => tag !== null)
      .sort(compareVersionTags);
  }

  versionDirectory(tag: VersionTag): string {
    return path.join(this.versionsDir, versionTagToDirectoryName(tag));
  }

  stagingDirectory(tag: VersionTag): string {
    return path.join(this.versionsDir, stagingDirectoryName(tag));
  }

  hasFinalized(tag: VersionTag): boolean {
    try {
      return fs.statSync(this.versionDirectory(tag)).isDirectory();
    } catch {
      return false;
    }
  }
}
