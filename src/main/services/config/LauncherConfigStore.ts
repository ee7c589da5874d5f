import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { LauncherConfig } from '@shared/contracts';

const DEFAULT_CONFIG: LauncherConfig = {
  programId: 'program',
  serverUrl: 'http://127.0.0.1:8000',
  executableName: process.platform === 'win32' ? 'program.exe' : 'program',
  retainCount: 2,
  autoUpdate: 'prompt',
  requestTimeoutMs: 10_000,
  lockStaleAfterMs: 30 * 60 * 1000,
  support: null
};

const supportSchema = z.object({
  siteUrl: z.string().trim().url(),
  qnaUrl: z.string().trim().url()
});

const configSchema = z.object({
  programId: z.string().trim().min(1).catch(DEFAULT_CONFIG.programId),
  serverUrl: z.string().trim().url().catch(DEFAULT_CONFIG.serverUrl),
  executableName: z
    .string()
    .trim()
    .min(1)
    .refine((value) => !value.includes('/') && !value.includes('\\'), 'executableName must be a bare file name')
    .catch(DEFAULT_CONFIG.executableName),
  retainCount: z.number().int().min(1).catch(DEFAULT_CONFIG.retainCount),
  autoUpdate: z.enum(['prompt', 'always', 'never']).catch(DEFAULT_CONFIG.autoUpdate),
  requestTimeoutMs: z.number().int().positive().catch(DEFAULT_CONFIG.requestTimeoutMs),
  lockStaleAfterMs: z.number().int().positive().catch(DEFAULT_CONFIG.lockStaleAfterMs),
  support: supportSchema.nullable().catch(DEFAULT_CONFIG.support)
});

export class LauncherConfigStore {
  private readonly filePath: string;
  private cache: LauncherConfig;

  constructor(baseDir: string) {
    const dataDir = path.join(baseDir, 'data');
    fs.mkdirSync(dataDir, { recursive: true });
    this.filePath = path.join(dataDir, 'app.json');
    this.cache = this.load();
  }

  get(): LauncherConfig {
    return {
      ...this.cache,
      support: this.cache.support ? { ...this.cache.support } : null
    };
  }

  private load(): LauncherConfig {
    if (!fs.existsSync(this.filePath)) {
      this.persist(DEFAULT_CONFIG);
      return DEFAULT_CONFIG;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      // campos invalidos caem no default individualmente; o arquivo do usuario nao e reescrito
      return configSchema.parse(raw && typeof raw === 'object' ? raw : {});
    } catch {
      return DEFAULT_CONFIG;
    }
  }

  private persist(config: LauncherConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}
