import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { URL } from 'node:url';
import type { Logger } from '../../infra/logger/logger.js';
import type { CommandRouter } from '../../core/command/CommandRouter.js';
import { mapToChatEvent } from './qqEventMapper.js';
import { QQMessageSender } from './QQMessageSender.js';

/**
 * Token from `Authorization: Bearer <t>` (OneBot11 standard), a bare
 * Authorization value, or `?access_token=<t>`.
 */
export function extractToken(
  authHeader: string | string[] | undefined,
  url: string | undefined,
  base = 'http://localhost',
): string | undefined {
  const header = Array.isArray(authHeader) ? authHeader[0] : authHeader;
  if (header) {
    return header.startsWith('Bearer ') ? header.substring(7) : header;
  }

  if (url) {
    try {
      const parsed = new URL(url, base);
      return parsed.searchParams.get('access_token') ?? undefined;
    } catch {
      return undefined;
    }
  }
  return undefined;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

/**
 * QQ/NapCat adapter - OneBot11 reverse WebSocket.
 * Normalizes message events to ChatEvent and hands commands to the router.
 */
export class QQAdapter {
  private wss: WebSocketServer | null = null;
  private connections: Set<WebSocket> = new Set();

  constructor(
    private router: CommandRouter,
    private logger: Logger,
    private wsPort: number = 6090,
    private token?: string,
  ) {}

  /**
   * Start reverse WebSocket server to accept connections from NapCat.
   */
  public start(): void {
    this.wss = new WebSocketServer({ port: this.wsPort, path: '/' });

    this.logger.info('qq-adapter', `Listening on ws://localhost:${this.wsPort}/`);

    this.wss.on('connection', (ws, req) => {
      if (this.token) {
        const providedToken = extractToken(
          req.headers['authorization'],
          req.url,
          `http://localhost:${this.wsPort}`,
        );
        if (providedToken !== this.token) {
          this.logger.warn('qq-adapter', 'Connection rejected: invalid token');
          ws.close(4401, 'Unauthorized');
          return;
        }
      } else {
        this.logger.warn('qq-adapter', 'Token not configured - accepting connection (dev mode)');
      }

      this.logger.info('qq-adapter', 'New connection established');
      this.connections.add(ws);

      // Replies go back over the connection the event arrived on
      const sender = new QQMessageSender(ws, this.logger);

      ws.on('message', async (data: RawData) => {
        try {
          const raw: unknown = JSON.parse(rawDataToString(data));
          const chatEvent = mapToChatEvent(raw, this.logger);
          if (!chatEvent) return; // meta events, notices, self messages
          await this.router.handle(chatEvent, sender);
        } catch (err) {
          this.logger.error(
            'qq-adapter',
            `Message handling error: ${err instanceof Error ? err.message : String(err)}`,
          );
        }
      });

      ws.on('close', () => {
        this.logger.info('qq-adapter', 'Connection closed');
        this.connections.delete(ws);
      });

      ws.on('error', (err: Error) => {
        this.logger.error('qq-adapter', `WebSocket error: ${err.message}`);
        this.connections.delete(ws);
      });
    });

    this.wss.on('error', (err: Error) => {
      this.logger.error('qq-adapter', `Server error: ${err.message}`);
    });
  }

  /**
   * Stop the reverse WebSocket server.
   */
  public stop(): void {
    if (!this.wss) return;
    for (const ws of this.connections) {
      ws.close();
    }
    this.wss.close(() => {
      this.logger.info('qq-adapter', 'Server stopped');
    });
    this.wss = null;
  }
}
