import fs from 'node:fs';
import path from 'node:path';
import logger from '../../utils/logger';
import { ISubscriberStore } from './types';

interface SubscriberFile {
  subscribers: number[];
}

/**
 * Chat ids subscribed to notifications, persisted as
 * `{ "subscribers": [...] }` and rewritten after every change.
 */
export class SubscriberStore implements ISubscriberStore {
  private readonly filePath: string;
  private readonly subscribers: Set<number>;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.subscribers = this.load();
  }

  list(): number[] {
    return Array.from(this.subscribers);
  }

  has(chatId: number): boolean {
    return this.subscribers.has(chatId);
  }

  add(chatId: number): boolean {
    if (this.subscribers.has(chatId)) return false;
    this.subscribers.add(chatId);
    this.save();
    return true;
  }

  remove(chatId: number): boolean {
    if (!this.subscribers.delete(chatId)) return false;
    this.save();
    return true;
  }

  get size(): number {
    return this.subscribers.size;
  }

  private load(): Set<number> {
    if (!fs.existsSync(this.filePath)) {
      return new Set();
    }

    try {
      const data: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const ids = SubscriberStore.parseIds(data);
      logger.info({ count: ids.length, file: this.filePath }, 'loaded subscribers');
      return new Set(ids);
    } catch (error) {
      logger.error({ err: error, file: this.filePath }, 'failed to load subscribers, starting empty');
      return new Set();
    }
  }

  private save(): void {
    const data: SubscriberFile = { subscribers: this.list() };
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2));
      logger.debug({ count: data.subscribers.length, file: this.filePath }, 'saved subscribers');
    } catch (error) {
      // The in-memory set stays authoritative until the next successful save
      logger.error({ err: error, file: this.filePath }, 'failed to save subscribers');
    }
  }

  static parseIds(data: unknown): number[] {
    if (typeof data !== 'object' || data === null || !('subscribers' in data)) {
      throw new Error('missing "subscribers" list');
    }
    const { subscribers } = data;
    if (!Array.isArray(subscribers)) {
      throw new Error('"subscribers" is not a list');
    }
    return subscribers.filter((id): id is number => Number.isInteger(id));
  }
}
