import { QuickReplyButton } from '../../types';
import { INotifier } from '../../domain/services/INotifier';
import { ILogger } from '../../domain/common/ILogger';
import { ChannelDeliveryError, errorMessage } from '../../domain/common/Errors';
import { ChannelConfig } from '../config/Config';

/**
 * Delivers messages by POSTing `{userId, message, buttons}` to the channel's webhook.
 */
export class WebhookChannelNotifier implements INotifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly config: ChannelConfig,
    private readonly logger: ILogger
  ) {}

  async send(userId: string, message: string, buttons: QuickReplyButton[] = []): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ userId, message, buttons }),
        signal: AbortSignal.timeout(this.config.timeoutMs)
      });
    } catch (err) {
      throw new ChannelDeliveryError(`Channel request failed: ${errorMessage(err)}`, { userId });
    }

    if (!response.ok) {
      throw new ChannelDeliveryError(`Channel rejected message with status ${response.status}`, {
        userId,
        status: response.status
      });
    }

    this.logger.debug(`Delivered message to user: ${userId}`, { buttons: buttons.length });
  }
}
