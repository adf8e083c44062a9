import { QuickReplyButton } from '../../types';

/**
 * Outbound messaging channel. Fire-and-forget from the caller's point of
 * view: callers log delivery failures and never retry.
 */
export interface INotifier {
  /**
   * Deliver a message to a user identified by an opaque id.
   * @throws {ChannelDeliveryError} if the channel rejects the message
   */
  send(userId: string, message: string, buttons?: QuickReplyButton[]): Promise<void>;
}
