import type { AliasRecord, PlayerSummary } from './types.js';

export const PERSONA_STATE_LABELS: Readonly<Record<number, string>> = {
  0: '离线',
  1: '在线',
  2: '忙碌',
  3: '离开',
  4: '暂离（打盹）',
  5: '寻找交易',
  6: '寻找玩伴',
};

const PERSONA_OFFLINE = 0;
/** communityvisibilitystate value for a fully public profile */
const VISIBILITY_PUBLIC = 3;

export function personaStateLabel(code: number): string {
  return PERSONA_STATE_LABELS[code] ?? `未知状态(${code})`;
}

/**
 * Local time as `YYYY-MM-DD HH:mm:ss <zone>`; falls back to the raw number
 * when the value or the zone cannot be converted.
 */
export function formatTimestamp(unixSeconds: number, timeZone?: string): string {
  try {
    const date = new Date(unixSeconds * 1000);
    const parts = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
      timeZoneName: 'short',
    }).formatToParts(date);
    const part = (type: Intl.DateTimeFormatPartTypes) =>
      parts.find((p) => p.type === type)?.value ?? '';
    return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')} ${part('timeZoneName')}`;
  } catch {
    return String(unixSeconds);
  }
}

export function formatStatus(steamid: string, info: PlayerSummary, timeZone?: string): string {
  const name = info.personaname ?? '<未公开昵称>';
  const privacy =
    info.communityvisibilitystate === VISIBILITY_PUBLIC
      ? ''
      : '该用户的个人资料未公开，可用信息受限。';
  const state = info.personastate;

  const parts = [`玩家: ${name}（${steamid}）`];
  if (state === undefined) {
    parts.push('状态: 无法判断（可能因隐私未公开）');
  } else {
    parts.push(`状态: ${personaStateLabel(state)}`);
    if (info.gameextrainfo) {
      parts.push(`当前游戏: ${info.gameextrainfo}`);
    }
    if (state === PERSONA_OFFLINE && info.lastlogoff) {
      parts.push(`最后下线时间: ${formatTimestamp(info.lastlogoff, timeZone)}`);
    }
  }
  if (info.profileurl) {
    parts.push(`档案: ${info.profileurl}`);
  }
  if (privacy) {
    parts.push(privacy);
  }
  return parts.join('\n');
}

export function formatWhois(alias: string, steamid: string, info: PlayerSummary): string {
  const lines = [`${alias} -> ${info.personaname ?? '<未公开>'}（${steamid}）`];
  if (info.profileurl) {
    lines.push(`档案: ${info.profileurl}`);
  }
  if (info.communityvisibilitystate !== VISIBILITY_PUBLIC) {
    lines.push('该用户资料未公开或部分未公开。');
  }
  return lines.join('\n');
}

export function formatAliasList(entries: ReadonlyArray<[string, AliasRecord]>): string {
  if (entries.length === 0) {
    return '本群未绑定任何别名。\n请使用：/steam link <别名> <steamid|vanity>';
  }
  const out = ['本群绑定列表：'];
  for (const [alias, record] of entries) {
    out.push(`- ${alias} -> ${record.personaname || '-'} (${record.steamid})`);
  }
  return out.join('\n');
}
