import type { NoticeInfo } from '@shared/contracts';
import type { LauncherLogger } from '@main/services/logging/Logger';
import type { HttpNoticeClient } from '@main/services/notices/HttpNoticeClient';
import type { NoticeAckStore } from '@main/services/notices/NoticeAckStore';
import type { NoticeDecision } from '@main/services/launcher/UpdatePrompt';

export class NoticeService {
  constructor(
    private readonly client: Pick<HttpNoticeClient, 'fetchLatest'>,
    private readonly ackStore: NoticeAckStore,
    private readonly logger: LauncherLogger
  ) {}

  async nextNotice(programId: string): Promise<NoticeInfo | null> {
    const result = await this.client.fetchLatest(programId);
    if (!result.ok) {
      this.logger.warn('notice.fetch.error', {
        programId,
        reason: result.reason
      });
      return null;
    }

    const notice = result.notice;
    if (!notice) {
      return null;
    }

    if (!notice.force && this.ackStore.isHidden(notice.id)) {
      this.logger.debug('notice.hidden', { id: notice.id });
      return null;
    }

    this.logger.info('notice.show', {
      id: notice.id,
      level: notice.level,
      force: notice.force
    });
    return notice;
  }

  acknowledge(notice: NoticeInfo, decision: NoticeDecision): void {
    if (decision !== 'hide-for-day' || notice.force) {
      return;
    }

    this.ackStore.hideFor(notice.id);
    this.logger.info('notice.hidden_for_day', { id: notice.id });
  }
}
