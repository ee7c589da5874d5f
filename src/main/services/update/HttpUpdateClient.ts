import { z } from 'zod';
import type { UpdateCheckResult, VersionTag } from '@shared/contracts';
import type { LauncherLogger } from '@main/services/logging/Logger';
import type { UpdateClient } from '@main/services/update/UpdateClient';
import { formatVersionTag, isNewerVersionTag, parseVersionTag } from '@main/services/versions/VersionTag';

const assetUrlSchema = z.string().url();

const latestResponseSchema = z.object({
  program_id: z.string().trim().min(1),
  latest_version: z.string().trim().min(1),
  asset: z
    .object({
      url: z.string().trim().nullish(),
      sha256: z.string().trim().nullish(),
      size: z.number().int().nonnegative().nullish()
    })
    .nullish()
});

interface HttpUpdateClientOptions {
  serverUrl: string;
  logger: LauncherLogger;
  timeoutMs?: number;
  userAgent?: string;
}

export class HttpUpdateClient implements UpdateClient {
  private readonly serverUrl: string;
  private readonly logger: LauncherLogger;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: HttpUpdateClientOptions) {
    this.serverUrl = options.serverUrl.replace(/\/+$/, '');
    this.logger = options.logger;
    this.timeoutMs = Number.isFinite(options.timeoutMs) ? Math.max(1, Math.trunc(options.timeoutMs ?? 10_000)) : 10_000;
    this.userAgent = options.userAgent ?? 'VersionLauncher/0.1';
  }

  async checkForUpdate(programId: string, localVersion: VersionTag | null): Promise<UpdateCheckResult> {
    const url = `${this.serverUrl}/launcher/api/v1/programs/${encodeURIComponent(programId)}/latest`;
    this.logger.info('update.check.start', {
      programId,
      localVersion: localVersion ? formatVersionTag(localVersion) : null,
      url
    });

    let body: unknown;
    try {
      const response = await fetch(url, {
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!response.ok) {
        const text = await response.text().catch(() => '');
        return this.failed(programId, `HTTP ${response.status}${text ? ` / ${text.slice(0, 200)}` : ''}`);
      }

      body = await response.json();
    } catch (error) {
      return this.failed(programId, describeFetchError(error));
    }

    const parsed = latestResponseSchema.safeParse(body);
    if (!parsed.success) {
      return this.failed(
        programId,
        `resposta invalida: ${parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')}`
      );
    }

    if (parsed.data.program_id !== programId) {
      return this.failed(programId, `resposta de outro programa: ${parsed.data.program_id}`);
    }

    const latest = parseVersionTag(parsed.data.latest_version);
    if (!latest) {
      return this.failed(programId, `latest_version invalida: ${parsed.data.latest_version}`);
    }

    if (!isNewerVersionTag(latest, localVersion)) {
      this.logger.info('update.check.finish', {
        programId,
        outcome: 'up-to-date',
        latestVersion: formatVersionTag(latest)
      });
      return { kind: 'up-to-date' };
    }

    const asset = parsed.data.asset;
    const sha256 = asset?.sha256?.toLowerCase() ?? '';
    if (!asset?.url || !/^[a-f0-9]{64}$/.test(sha256) || typeof asset.size !== 'number') {
      return this.failed(programId, `versao ${formatVersionTag(latest)} sem asset completo (url, sha256, size)`);
    }
    if (!assetUrlSchema.safeParse(asset.url).success) {
      return this.failed(programId, `asset.url invalida: ${asset.url}`);
    }

    this.logger.info('update.check.finish', {
      programId,
      outcome: 'available',
      latestVersion: formatVersionTag(latest),
      size: asset.size
    });

    return {
      kind: 'update-available',
      descriptor: {
        version: latest,
        downloadUrl: asset.url,
        sha256,
        size: asset.size
      }
    };
  }

  private failed(programId: string, reason: string): UpdateCheckResult {
    this.logger.warn('update.check.error', {
      programId,
      reason,
      code: 'check_failed'
    });
    return { kind: 'check-failed', code: 'check_failed', reason };
  }
}

function describeFetchError(error: unknown): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'tempo esgotado ao consultar o servidor';
  }

  return error instanceof Error ? error.message : String(error);
}
