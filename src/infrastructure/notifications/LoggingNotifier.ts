import { QuickReplyButton } from '../../types';
import { INotifier } from '../../domain/services/INotifier';
import { ILogger } from '../../domain/common/ILogger';

/**
 * Notifier used when no outbound channel is configured.
 */
export class LoggingNotifier implements INotifier {
  constructor(private readonly logger: ILogger) {}

  async send(userId: string, message: string, buttons: QuickReplyButton[] = []): Promise<void> {
    this.logger.info(`Outbound message for user: ${userId}`, {
      message,
      buttons: buttons.map(b => b.callback)
    });
  }
}
