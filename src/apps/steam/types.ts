import { z } from 'zod';

/**
 * One alias binding as persisted on disk. Field names follow the Steam
 * Web API so a stored record reads like the summary it was taken from.
 */
export const AliasRecordSchema = z.object({
  /** Canonical SteamID64, decimal digits */
  steamid: z.string().regex(/^\d+$/),
  /** Profile URL at bind time, may be empty */
  profileurl: z.string().default(''),
  /** Display name at bind time, may be empty */
  personaname: z.string().default(''),
  /** Unix seconds (UTC) when the alias was bound */
  created_at: z.number().int(),
});

export type AliasRecord = z.infer<typeof AliasRecordSchema>;

/** Aliases in insertion order */
export interface ChatScope {
  aliases: Map<string, AliasRecord>;
}

/** Whole persisted document, keyed by chat key */
export type AliasStoreData = Map<string, ChatScope>;

export const PlayerSummarySchema = z.object({
  steamid: z.string(),
  personaname: z.string().optional(),
  profileurl: z.string().optional(),
  avatarfull: z.string().optional(),
  personastate: z.number().int().optional(),
  communityvisibilitystate: z.number().int().optional(),
  profilestate: z.number().int().optional(),
  lastlogoff: z.number().optional(),
  gameid: z.string().optional(),
  gameextrainfo: z.string().optional(),
  realname: z.string().optional(),
  loccountrycode: z.string().optional(),
  timecreated: z.number().optional(),
});

export type PlayerSummary = z.infer<typeof PlayerSummarySchema>;

export const PlayerSummariesResponseSchema = z.object({
  response: z.object({
    players: z.array(PlayerSummarySchema),
  }),
});

export const ResolveVanityResponseSchema = z.object({
  response: z.object({
    success: z.number(),
    steamid: z.string().optional(),
    message: z.string().optional(),
  }),
});

/**
 * Why a remote lookup produced nothing.
 * - no_api_key: no credential configured, no request was made
 * - not_found: the API answered but has no such account
 * - transport: network error, timeout or non-2xx status
 * - malformed: body was not JSON or not the expected shape
 */
export type LookupFailureReason = 'no_api_key' | 'not_found' | 'transport' | 'malformed';

export type LookupResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: LookupFailureReason; detail?: string };
