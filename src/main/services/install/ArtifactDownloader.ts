import crypto from 'node:crypto';
import fs, { type FileHandle } from 'node:fs/promises';
import type { DownloadProgress } from '@shared/contracts';

export interface DownloadRequest {
  url: string;
  destinationPath: string;
  expectedSize?: number;
  signal?: AbortSignal;
  onProgress?: (progress: DownloadProgress) => void;
}

export interface DownloadedArtifact {
  path: string;
  bytes: number;
  sha256: string;
}

export interface ArtifactDownloader {
  download(request: DownloadRequest): Promise<DownloadedArtifact>;
}

export class DownloadSizeExceededError extends Error {
  constructor(
    readonly expectedBytes: number,
    readonly receivedBytes: number
  ) {
    super(`Pacote maior que o tamanho declarado: esperado ${expectedBytes}, recebido ao menos ${receivedBytes}.`);
    this.name = 'DownloadSizeExceededError';
  }
}

export class HttpArtifactDownloader implements ArtifactDownloader {
  constructor(private readonly userAgent = 'VersionLauncher/0.1') {}

  async download(request: DownloadRequest): Promise<DownloadedArtifact> {
    const { signal } = request;
    throwIfCancelled(signal);

    let response: Response;
    try {
      response = await fetch(request.url, {
        headers: {
          Accept: 'application/octet-stream, */*',
          'User-Agent': this.userAgent
        },
        redirect: 'follow',
        signal
      });
    } catch (error) {
      throwIfCancelled(signal);
      throw error;
    }

    if (!response.ok) {
      throw new Error(`Falha no download do pacote: HTTP ${response.status}.`);
    }
    if (!response.body) {
      throw new Error('Falha no download do pacote: corpo da resposta vazio.');
    }

    const totalBytes = resolveTotalBytes(response.headers.get('content-length'), request.expectedSize);
    const maxBytes = typeof request.expectedSize === 'number' && request.expectedSize >= 0 ? request.expectedSize : null;
    const hash = crypto.createHash('sha256');
    const reader = response.body.getReader();
    let finished = false;

    let handle: FileHandle;
    try {
      handle = await fs.open(request.destinationPath, 'wx');
    } catch (error) {
      await reader.cancel().catch(() => undefined);
      throw error;
    }

    const onAbort = () => {
      reader.cancel().catch(() => undefined);
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    let receivedBytes = 0;
    try {
      while (true) {
        throwIfCancelled(signal);
        const chunk = await reader.read();
        if (chunk.done) {
          finished = true;
          break;
        }

        const bytes = chunk.value ?? new Uint8Array(0);
        if (bytes.length === 0) {
          continue;
        }

        if (maxBytes !== null && receivedBytes + bytes.length > maxBytes) {
          throw new DownloadSizeExceededError(maxBytes, receivedBytes + bytes.length);
        }

        hash.update(bytes);
        await handle.write(bytes);
        receivedBytes += bytes.length;
        request.onProgress?.({ receivedBytes, totalBytes });
      }
      throwIfCancelled(signal);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!finished) {
        await reader.cancel().catch(() => undefined);
      }
      await handle.close();
    }

    return {
      path: request.destinationPath,
      bytes: receivedBytes,
      sha256: hash.digest('hex')
    };
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const error = new Error('Download cancelado.');
    error.name = 'AbortError';
    throw error;
  }
}

function resolveTotalBytes(contentLength: string | null, expectedSize: number | undefined): number {
  const parsed = contentLength ? Number.parseInt(contentLength, 10) : Number.NaN;
  if (Number.isFinite(parsed) && parsed > 0) {
    return parsed;
  }

  return typeof expectedSize === 'number' && expectedSize > 0 ? expectedSize : 0;
}
