import type { MessageSender, SendOptions } from '../../src/core/messaging/MessageSender.js';
import type { FetchLike } from '../../src/apps/steam/SteamClient.js';
import type { PlayerSummary } from '../../src/apps/steam/types.js';

export type SentMessage = { targetId: string; text: string; options?: SendOptions };

export class RecordingSender implements MessageSender {
  readonly sent: SentMessage[] = [];

  async sendText(targetId: string, text: string, options?: SendOptions): Promise<void> {
    this.sent.push({ targetId, text, options });
  }
}

export interface FakeSteamData {
  /** vanity name -> steamid */
  vanity?: Record<string, string>;
  /** steamid -> summary */
  players?: Record<string, PlayerSummary>;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * In-process stand-in for the two ISteamUser endpoints.
 */
export function createFakeSteamFetch(data: FakeSteamData): FetchLike & { calls: URL[] } {
  const calls: URL[] = [];
  const fakeFetch = async (input: string): Promise<Response> => {
    const url = new URL(input);
    calls.push(url);
    if (url.pathname === '/ISteamUser/ResolveVanityURL/v1/') {
      const name = url.searchParams.get('vanityurl') ?? '';
      const steamid = data.vanity?.[name];
      return jsonResponse(
        steamid
          ? { response: { steamid, success: 1 } }
          : { response: { success: 42, message: 'No match' } },
      );
    }
    if (url.pathname === '/ISteamUser/GetPlayerSummaries/v2/') {
      const id = url.searchParams.get('steamids') ?? '';
      const player = data.players?.[id];
      return jsonResponse({ response: { players: player ? [player] : [] } });
    }
    return jsonResponse({}, 404);
  };
  return Object.assign(fakeFetch, { calls });
}
