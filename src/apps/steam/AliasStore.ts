/**
 * JSON-file alias store: per-chat mapping from alias to Steam account.
 *
 * Every operation reads the file fresh and every mutation writes the whole
 * document back through a temp file + rename, so readers never see a
 * partial write. One SerialLock per store instance orders all of it.
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import { SerialLock } from '../../core/storage/SerialLock.js';
import { parseOrderedJson, stringifyOrdered } from '../../core/storage/orderedJson.js';
import { AliasRecordSchema, type AliasRecord, type AliasStoreData } from './types.js';

export interface AliasStore {
  load(): Promise<AliasStoreData>;
  save(data: AliasStoreData): Promise<void>;
  /** Returns the normalized alias the record was stored under */
  upsertAlias(chatKey: string, alias: string, record: AliasRecord): Promise<string>;
  removeAlias(chatKey: string, alias: string): Promise<boolean>;
  listAliases(chatKey: string): Promise<Array<[string, AliasRecord]>>;
  getAlias(chatKey: string, alias: string): Promise<AliasRecord | undefined>;
}

/**
 * `" @Foo "` → `"foo"`
 */
export function normalizeAlias(raw: string): string {
  return raw.trim().replace(/^@+/, '').toLowerCase();
}

// Objects come back from parseOrderedJson as Maps
const JsonObjectSchema = z.map(z.string(), z.unknown());

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonAliasStore implements AliasStore {
  private readonly lock = new SerialLock();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  load(): Promise<AliasStoreData> {
    return this.lock.run(() => this.readUnlocked());
  }

  save(data: AliasStoreData): Promise<void> {
    return this.lock.run(() => this.writeUnlocked(data));
  }

  upsertAlias(chatKey: string, alias: string, record: AliasRecord): Promise<string> {
    const key = normalizeAlias(alias);
    return this.lock.run(async () => {
      const data = await this.readUnlocked();
      const scope = data.get(chatKey) ?? { aliases: new Map<string, AliasRecord>() };
      scope.aliases.set(key, record);
      data.set(chatKey, scope);
      await this.writeUnlocked(data);
      this.logger.debug('alias-store', `Bound ${chatKey}/${key} -> ${record.steamid}`);
      return key;
    });
  }

  removeAlias(chatKey: string, alias: string): Promise<boolean> {
    const key = normalizeAlias(alias);
    return this.lock.run(async () => {
      const data = await this.readUnlocked();
      const aliases = data.get(chatKey)?.aliases;
      if (!aliases?.delete(key)) return false;
      await this.writeUnlocked(data);
      this.logger.debug('alias-store', `Removed ${chatKey}/${key}`);
      return true;
    });
  }

  async listAliases(chatKey: string): Promise<Array<[string, AliasRecord]>> {
    const data = await this.load();
    return Array.from(data.get(chatKey)?.aliases ?? []);
  }

  async getAlias(chatKey: string, alias: string): Promise<AliasRecord | undefined> {
    const key = normalizeAlias(alias);
    return (await this.load()).get(chatKey)?.aliases.get(key);
  }

  private async readUnlocked(): Promise<AliasStoreData> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn(
          'alias-store',
          `Cannot read ${this.filePath}, treating as empty: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      return new Map();
    }

    let parsed: unknown;
    try {
      parsed = parseOrderedJson(raw);
    } catch (error) {
      this.logger.warn(
        'alias-store',
        `Malformed JSON in ${this.filePath}, treating as empty: ${error instanceof Error ? error.message : String(error)}`,
      );
      return new Map();
    }

    const doc = JsonObjectSchema.safeParse(parsed);
    if (!doc.success) {
      this.logger.warn('alias-store', `Unexpected document shape in ${this.filePath}, treating as empty`);
      return new Map();
    }

    const data: AliasStoreData = new Map();
    for (const [chatKey, scopeRaw] of doc.data) {
      const scope = JsonObjectSchema.safeParse(scopeRaw);
      const aliasesRaw = scope.success ? JsonObjectSchema.safeParse(scope.data.get('aliases')) : scope;
      if (!aliasesRaw.success) {
        this.logger.warn('alias-store', `Dropping invalid chat scope: ${chatKey}`);
        continue;
      }
      const aliases = new Map<string, AliasRecord>();
      for (const [alias, recordRaw] of aliasesRaw.data) {
        const fields = recordRaw instanceof Map ? Object.fromEntries(recordRaw) : recordRaw;
        const record = AliasRecordSchema.safeParse(fields);
        if (record.success) {
          aliases.set(alias, record.data);
        } else {
          this.logger.warn('alias-store', `Dropping invalid record: ${chatKey}/${alias}`);
        }
      }
      data.set(chatKey, { aliases });
    }
    return data;
  }

  private async writeUnlocked(data: AliasStoreData): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Atomic write: temp → write → rename
    const tempPath = `${this.filePath}.${randomUUID().slice(0, 8)}.tmp`;
    try {
      await fs.writeFile(tempPath, stringifyOrdered(data), 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      this.logger.error(
        'alias-store',
        `Failed to write ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }
}
