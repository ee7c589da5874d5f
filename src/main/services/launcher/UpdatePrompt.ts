import readline from 'node:readline/promises';
import type { NoticeInfo } from '@shared/contracts';

export interface UpdatePromptRequest {
  programId: string;
  currentVersion: string;
  latestVersion: string;
  sizeBytes: number;
}

export type NoticeDecision = 'dismiss' | 'hide-for-day';

export interface UpdatePrompt {
  confirmUpdate(request: UpdatePromptRequest): Promise<boolean>;
  showNotice?(notice: NoticeInfo): Promise<NoticeDecision>;
}

export class FixedUpdatePrompt implements UpdatePrompt {
  constructor(private readonly decision: boolean) {}

  async confirmUpdate(): Promise<boolean> {
    return this.decision;
  }
}

interface ConsoleUpdatePromptOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  defaultAnswer?: boolean;
}

export class ConsoleUpdatePrompt implements UpdatePrompt {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly defaultAnswer: boolean;

  constructor(options: ConsoleUpdatePromptOptions) {
    this.input = options.input;
    this.output = options.output;
    this.defaultAnswer = options.defaultAnswer ?? true;
  }

  async confirmUpdate(request: UpdatePromptRequest): Promise<boolean> {
    const hint = this.defaultAnswer ? '[S/n]' : '[s/N]';
    const answer = await this.ask(
      `Nova versao ${request.latestVersion} disponivel (atual ${request.currentVersion}, ${formatBytes(request.sizeBytes)}). Atualizar agora? ${hint} `
    );
    return parseYesNo(answer, this.defaultAnswer);
  }

  async showNotice(notice: NoticeInfo): Promise<NoticeDecision> {
    this.output.write(`\n[${notice.level}] ${notice.title}\n${notice.content}\n\n`);
    if (notice.force) {
      await this.ask('Pressione Enter para continuar. ');
      return 'dismiss';
    }

    const answer = await this.ask('Ocultar este aviso por 24 horas? [s/N] ');
    return parseYesNo(answer, false) ? 'hide-for-day' : 'dismiss';
  }

  private async ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  }
}

export function parseYesNo(answer: string, fallback: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (!normalized) {
    return fallback;
  }
  if (['s', 'sim', 'y', 'yes'].includes(normalized)) {
    return true;
  }
  if (['n', 'nao', 'no'].includes(normalized)) {
    return false;
  }
  return fallback;
}

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return 'tamanho desconhecido';
  }
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
