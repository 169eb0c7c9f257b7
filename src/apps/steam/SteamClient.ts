import type { ZodType } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import {
  PlayerSummariesResponseSchema,
  ResolveVanityResponseSchema,
  type LookupResult,
  type PlayerSummary,
} from './types.js';

/** Added to a 32-bit account ID to get the SteamID64 of an individual account */
export const STEAMID64_INDIVIDUAL_OFFSET = 76561197960265728n;

export const DEFAULT_STEAM_API_HOST = 'https://api.steampowered.com';
export const DEFAULT_TIMEOUT_MS = 8000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SteamClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  logger: Logger;
}

/**
 * What the command layer needs from the Steam side.
 */
export interface SteamResolver {
  readonly hasApiKey: boolean;
  resolveIdentifier(raw: string): Promise<LookupResult<string>>;
  fetchSummary(steamid64: string): Promise<LookupResult<PlayerSummary>>;
}

/**
 * Steam Web API client (ISteamUser endpoints only).
 *
 * Holds nothing but the credential and endpoint settings: no cache, no
 * retries. Every failure comes back as a LookupResult, never as a throw.
 */
export class SteamClient implements SteamResolver {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: SteamClientOptions) {
    this.apiKey = options.apiKey.trim();
    this.baseUrl = (options.baseUrl ?? DEFAULT_STEAM_API_HOST).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  get hasApiKey(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Turn user input into a SteamID64.
   *
   * Digits of length ≥ 16 pass through, shorter digit strings are read as
   * SteamID32, anything else goes to vanity lookup.
   */
  async resolveIdentifier(raw: string): Promise<LookupResult<string>> {
    const s = raw.trim().replace(/^@+/, '');
    if (!s) return { ok: false, reason: 'not_found', detail: 'empty identifier' };

    if (/^\d+$/.test(s)) {
      if (s.length >= 16) return { ok: true, value: s };
      return { ok: true, value: (BigInt(s) + STEAMID64_INDIVIDUAL_OFFSET).toString() };
    }

    return this.resolveVanity(s);
  }

  /** Same as resolveIdentifier, collapsed to id-or-null */
  async normalizeIdentifier(raw: string): Promise<string | null> {
    const result = await this.resolveIdentifier(raw);
    return result.ok ? result.value : null;
  }

  async resolveVanity(name: string): Promise<LookupResult<string>> {
    const result = await this.getJson(
      '/ISteamUser/ResolveVanityURL/v1/',
      { vanityurl: name },
      ResolveVanityResponseSchema,
    );
    if (!result.ok) return result;

    const { success, steamid, message } = result.value.response;
    if (success === 1 && steamid) {
      this.logger.debug('steam-client', `Vanity "${name}" -> ${steamid}`);
      return { ok: true, value: steamid };
    }
    this.logger.debug('steam-client', `Vanity "${name}" not found (success=${success})`);
    return { ok: false, reason: 'not_found', detail: message };
  }

  async fetchSummary(steamid64: string): Promise<LookupResult<PlayerSummary>> {
    const result = await this.getJson(
      '/ISteamUser/GetPlayerSummaries/v2/',
      { steamids: steamid64 },
      PlayerSummariesResponseSchema,
    );
    if (!result.ok) return result;

    const player = result.value.response.players[0];
    if (!player) {
      this.logger.debug('steam-client', `No player summary for ${steamid64}`);
      return { ok: false, reason: 'not_found' };
    }
    return { ok: true, value: player };
  }

  private async getJson<T>(
    endpoint: string,
    params: Record<string, string>,
    schema: ZodType<T>,
  ): Promise<LookupResult<T>> {
    if (!this.hasApiKey) {
      return { ok: false, reason: 'no_api_key' };
    }

    const query = new URLSearchParams({ key: this.apiKey, ...params });
    const startTime = Date.now();

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${endpoint}?${query.toString()}`, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn('steam-client', `${endpoint} request failed: ${detail}`);
      return { ok: false, reason: 'transport', detail };
    }

    if (!response.ok) {
      this.logger.warn('steam-client', `${endpoint} returned HTTP ${response.status}`);
      return { ok: false, reason: 'transport', detail: `HTTP ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn('steam-client', `${endpoint} returned invalid JSON: ${detail}`);
      return { ok: false, reason: 'malformed', detail };
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn('steam-client', `${endpoint} response has unexpected shape`);
      return { ok: false, reason: 'malformed', detail: parsed.error.message };
    }

    this.logger.debug('steam-client', `${endpoint} completed in ${Date.now() - startTime}ms`);
    return { ok: true, value: parsed.data };
  }
}
