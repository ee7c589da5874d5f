import fs from 'node:fs';
import path from 'node:path';

const DAY_SECONDS = 60 * 60 * 24;

export class NoticeAckStore {
  private readonly filePath: string;
  private readonly now: () => number;

  constructor(baseDir: string, now: () => number = Date.now) {
    const dataDir = path.join(baseDir, 'data');
    fs.mkdirSync(dataDir, { recursive: true });
    this.filePath = path.join(dataDir, 'notice-ack.json');
    this.now = now;
  }

  isHidden(noticeId: string): boolean {
    const until = this.load()[noticeId.trim()];
    return typeof until === 'number' && until > this.nowEpoch();
  }

  hideFor(noticeId: string, seconds: number = DAY_SECONDS): void {
    const id = noticeId.trim();
    if (!id) {
      return;
    }

    const acks = this.load();
    acks[id] = this.nowEpoch() + Math.max(0, Math.trunc(seconds));
    this.persist(acks);
  }

  private load(): Record<string, number> {
    if (!fs.existsSync(this.filePath)) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
        return {};
      }

      const acks: Record<string, number> = {};
      for (const [key, value] of Object.entries(parsed)) {
        if (key.trim() && typeof value === 'number' && Number.isInteger(value)) {
          acks[key.trim()] = value;
        }
      }
      return acks;
    } catch {
      return {};
    }
  }

  private persist(acks: Record<string, number>): void {
    const tempPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(acks, null, 2), 'utf-8');
    fs.renameSync(tempPath, this.filePath);
  }

  private nowEpoch(): number {
    return Math.floor(this.now() / 1000);
  }
}
