import type { Logger } from '../../infra/logger/logger.js';
import { normalizeAlias, type AliasStore } from './AliasStore.js';
import type { SteamResolver } from './SteamClient.js';
import { formatAliasList, formatStatus, formatWhois } from './presenceFormatter.js';
import type { LookupResult } from './types.js';

export const STEAM_HELP_TEXT = [
  'Steam 插件帮助',
  '- /steam help 查看帮助',
  '- /steam link <别名> <steamid|vanity> 绑定别名',
  '- /steam unlink <别名> 解绑别名',
  '- /steam list 查看本群所有绑定',
  '- /steam status <别名|steamid|vanity> 查询在线状态',
  '- /steam whois <别名> 查看绑定详情',
  '请在配置中填写 steam.api_key（https://steamcommunity.com/dev/apikey），并将 steam.enabled 设为 true。',
].join('\n');

export const MSG_USAGE = '用法不正确。输入 /steam help 查看帮助。';
export const MSG_NO_API_KEY = '请先配置 steam.api_key。';
export const MSG_STORAGE_FAILED = '存储失败，请稍后再试。';

export interface SteamCommandDeps {
  store: AliasStore;
  client: SteamResolver;
  logger: Logger;
  /** Milliseconds since epoch */
  now?: () => number;
  /** IANA zone for rendered timestamps; host zone when unset */
  timeZone?: string;
}

/**
 * `/steam` subcommands. `handle` always resolves to reply text.
 */
export class SteamCommandHandler {
  private readonly store: AliasStore;
  private readonly client: SteamResolver;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly timeZone?: string;

  constructor(deps: SteamCommandDeps) {
    this.store = deps.store;
    this.client = deps.client;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
    this.timeZone = deps.timeZone;
  }

  async handle(verb: string, args: readonly string[], chatKey: string): Promise<string> {
    const sub = verb.trim().toLowerCase();
    const [a = '', b = ''] = args;

    if (args.length > 2) return MSG_USAGE;

    try {
      switch (sub) {
        case '':
        case 'help':
          return STEAM_HELP_TEXT;
        case 'list':
          return formatAliasList(await this.store.listAliases(chatKey));
        case 'unlink':
          return a ? await this.unlink(chatKey, a) : MSG_USAGE;
        case 'whois':
          return a ? await this.whois(chatKey, a) : MSG_USAGE;
        case 'link':
          return a && b ? await this.link(chatKey, a, b) : MSG_USAGE;
        case 'status':
          return a ? await this.status(chatKey, a) : MSG_USAGE;
        default:
          return MSG_USAGE;
      }
    } catch (error) {
      this.logger.error(
        'steam-command',
        `/steam ${sub} failed in ${chatKey}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return MSG_STORAGE_FAILED;
    }
  }

  private async link(chatKey: string, rawAlias: string, ident: string): Promise<string> {
    if (!this.client.hasApiKey) return MSG_NO_API_KEY;

    const alias = normalizeAlias(rawAlias);
    if (!alias) return MSG_USAGE;

    const resolved = await this.client.resolveIdentifier(ident);
    if (!resolved.ok) return this.unresolvedMessage(resolved, ident);
    const steamid = resolved.value;

    const summary = await this.client.fetchSummary(steamid);
    if (!summary.ok) {
      return `绑定失败：未能获取该账号信息（steamid: ${steamid}）。`;
    }

    const info = summary.value;
    const key = await this.store.upsertAlias(chatKey, alias, {
      steamid,
      profileurl: info.profileurl ?? '',
      personaname: info.personaname ?? '',
      created_at: Math.floor(this.now() / 1000),
    });
    this.logger.info('steam-command', `Linked ${chatKey}/${key} -> ${steamid}`);
    return `已绑定：${key} -> ${info.personaname ?? ''} (${steamid})`;
  }

  private async unlink(chatKey: string, rawAlias: string): Promise<string> {
    const alias = normalizeAlias(rawAlias);
    const removed = await this.store.removeAlias(chatKey, alias);
    if (!removed) return `未找到别名：${alias}`;
    this.logger.info('steam-command', `Unlinked ${chatKey}/${alias}`);
    return `已解除绑定：${alias}`;
  }

  private async whois(chatKey: string, rawAlias: string): Promise<string> {
    const alias = normalizeAlias(rawAlias);
    const record = await this.store.getAlias(chatKey, alias);
    if (!record) return `未找到别名：${alias}`;

    const steamid = record.steamid;
    const summary = await this.client.fetchSummary(steamid);
    if (!summary.ok) {
      if (summary.reason === 'no_api_key') return MSG_NO_API_KEY;
      return `${alias} -> ${steamid}\n无法获取详细信息，可能隐私未公开或 API 出错。`;
    }
    return formatWhois(alias, steamid, summary.value);
  }

  private async status(chatKey: string, target: string): Promise<string> {
    // A bound alias wins over reading the same text as an identifier
    const record = await this.store.getAlias(chatKey, target);
    let steamid: string;
    if (record) {
      steamid = record.steamid;
    } else {
      const resolved = await this.client.resolveIdentifier(target);
      if (!resolved.ok) return this.unresolvedMessage(resolved, target);
      steamid = resolved.value;
    }

    const summary = await this.client.fetchSummary(steamid);
    if (!summary.ok) {
      if (summary.reason === 'no_api_key') return MSG_NO_API_KEY;
      return `未能获取到用户信息（steamid: ${steamid}），可能是隐私设置或 API 出错。`;
    }
    return formatStatus(steamid, summary.value, this.timeZone);
  }

  private unresolvedMessage(result: LookupResult<string>, input: string): string {
    if (!result.ok && result.reason === 'no_api_key') return MSG_NO_API_KEY;
    return `无法解析为 SteamID：${input}`;
  }
}
