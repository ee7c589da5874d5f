import { z } from 'zod';
import type { NoticeInfo, NoticeLevel } from '@shared/contracts';

const noticeSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()).pipe(z.string().min(1)),
  level: z.unknown().optional(),
  force: z.unknown().optional(),
  title: z.unknown().optional(),
  content: z.unknown().optional()
});

export type NoticeFetchResult =
  | { ok: true; notice: NoticeInfo | null }
  | { ok: false; reason: string };

interface HttpNoticeClientOptions {
  serverUrl: string;
  timeoutMs?: number;
  userAgent?: string;
}

export class HttpNoticeClient {
  private readonly serverUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: HttpNoticeClientOptions) {
    this.serverUrl = options.serverUrl.replace(/\/+$/, '');
    this.timeoutMs = Number.isFinite(options.timeoutMs) ? Math.max(1, Math.trunc(options.timeoutMs ?? 5_000)) : 5_000;
    this.userAgent = options.userAgent ?? 'VersionLauncher/0.1';
  }

  async fetchLatest(programId: string): Promise<NoticeFetchResult> {
    const url = `${this.serverUrl}/launcher/api/v1/programs/${encodeURIComponent(programId)}/notices/latest`;

    let body: unknown;
    try {
      const response = await fetch(url, {
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (response.status === 204) {
        return { ok: true, notice: null };
      }
      if (!response.ok) {
        return { ok: false, reason: `HTTP ${response.status}` };
      }

      body = await response.json();
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    // o servidor pode ou nao embrulhar o aviso em { notice }
    const wrapped = z.object({ notice: z.unknown() }).safeParse(body);
    const candidate = wrapped.success && wrapped.data.notice !== undefined ? wrapped.data.notice : body;
    if (candidate === null) {
      return { ok: true, notice: null };
    }

    const parsed = noticeSchema.safeParse(candidate);
    if (!parsed.success) {
      return { ok: false, reason: 'resposta invalida: "id"' };
    }

    return {
      ok: true,
      notice: {
        id: parsed.data.id,
        level: normalizeLevel(textOf(parsed.data.level)),
        force: parsed.data.force === true,
        title: textOf(parsed.data.title),
        content: textOf(parsed.data.content)
      }
    };
  }
}

function normalizeLevel(value: string): NoticeLevel {
  const normalized = value.toUpperCase();
  return normalized === 'CRITICAL' || normalized === 'IMPORTANT' ? normalized : 'INFO';
}

function textOf(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  return (typeof value === 'string' ? value : String(value)).trim();
}
