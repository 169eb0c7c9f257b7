import type { MessageSender, SendOptions } from '../../core/messaging/MessageSender.js';
import type { Logger } from '../../infra/logger/logger.js';

type Segment = { type: string; data: Record<string, unknown> };

export interface OneBotAction {
  action: 'send_group_msg' | 'send_private_msg';
  params: {
    group_id?: number;
    user_id?: number;
    message: Segment[];
  };
}

/** The part of a ws socket the sender needs */
export interface ActionSocket {
  send(data: string): void;
}

/**
 * Build the OneBot11 action for a text reply.
 */
export function buildSendAction(targetId: string, text: string, options: SendOptions = {}): OneBotAction {
  const segments: Segment[] = [];
  if (options.replyTo && options.replyTo !== '0') {
    const parsed = Number.parseInt(options.replyTo, 10);
    segments.push({
      type: 'reply',
      data: { id: Number.isFinite(parsed) ? parsed : options.replyTo },
    });
  }
  segments.push({ type: 'text', data: { text } });

  const id = Number.parseInt(targetId, 10);
  return options.isPrivate
    ? { action: 'send_private_msg', params: { user_id: id, message: segments } }
    : { action: 'send_group_msg', params: { group_id: id, message: segments } };
}

/**
 * QQ/NapCat message sender implementation.
 * Converts MessageSender interface to OneBot11 API calls.
 */
export class QQMessageSender implements MessageSender {
  constructor(
    private ws: ActionSocket,
    private logger: Logger,
  ) {}

  async sendText(targetId: string, text: string, options?: SendOptions): Promise<void> {
    const message = buildSendAction(targetId, text, options);

    try {
      this.logger.info(
        'qq-sender',
        `Sending to ${options?.isPrivate ? 'user' : 'group'} ${targetId}: "${text.substring(0, 40)}..." (${text.length} chars)`,
      );
      this.ws.send(JSON.stringify(message));
    } catch (error) {
      this.logger.error(
        'qq-sender',
        `Failed to send message: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      throw error;
    }
  }
}
