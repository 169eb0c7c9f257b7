export interface SendOptions {
  /** Message ID to quote in the reply */
  replyTo?: string;
  /** Target is a user (direct message) rather than a group */
  isPrivate?: boolean;
}

/**
 * Unified message sending interface.
 * All platform adapters should implement this to send messages.
 */
export interface MessageSender {
  /**
   * Send plain text message to a group or user.
   * @param targetId - Group ID, or user ID when `options.isPrivate` is set
   */
  sendText(targetId: string, text: string, options?: SendOptions): Promise<void>;
}
