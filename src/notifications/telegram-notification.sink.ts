import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { errorMessage } from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { BatchSummary } from '../pipeline/pipeline.types';
import { formatBatchSummary } from './batch-summary.formatter';
import { NotificationSink } from './notification-sink';

export const NOTIFICATIONS_HTTP = Symbol('NOTIFICATIONS_HTTP');

@Injectable()
export class TelegramNotificationSink extends NotificationSink {
  private readonly logger = new Logger(TelegramNotificationSink.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    @Inject(NOTIFICATIONS_HTTP) private readonly http: AxiosInstance,
  ) {
    super();
  }

  async send(summary: BatchSummary): Promise<boolean> {
    const { botToken, chatId } = this.settings.telegram;
    if (!botToken || !chatId) {
      this.logger.debug('Telegram not configured; batch summary not sent');
      return false;
    }

    try {
      await this.http.post(
        `https://api.telegram.org/bot${botToken}/sendMessage`,
        {
          chat_id: chatId,
          text: formatBatchSummary(summary),
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        },
        { timeout: this.settings.httpTimeoutMs },
      );
      return true;
    } catch (error) {
      this.logger.warn(`Failed to send batch summary for ${summary.stage}: ${errorMessage(error)}`);
      return false;
    }
  }
}
