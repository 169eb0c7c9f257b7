/**
 * Platform-agnostic chat event structure.
 * All platform adapters should normalize their events to this format.
 */
export interface ChatEvent {
  /** Platform identifier */
  platform: 'qq' | 'cli';

  /** Group ID, or the peer's user ID for direct messages */
  groupId: string;

  /** User ID */
  userId: string;

  /** Message ID (for reply reference) */
  messageId: string;

  /** Plain text content */
  rawText: string;

  /** Timestamp (milliseconds) */
  timestamp: number;

  /** Optional: User display name */
  userName?: string;

  /** Optional: Is private message (DM) */
  isPrivate?: boolean;
}
