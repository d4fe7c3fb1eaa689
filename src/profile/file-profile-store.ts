import * as fs from 'fs';
import * as path from 'path';
import type { UserProfile } from '../types';
import { describeError } from '../utils/errors';
import { componentLog } from '../utils/logger';
import { parseProfileRecord } from '../utils/validators';
import type { ProfileStore, PutResult, StoredProfile } from './profile-store';

/**
 * One JSON file per user under `storageDir`. Reads and the revision check
 * run synchronously inside a single call, so writers in one process cannot
 * interleave between check and write. Files that fail validation are
 * treated as missing.
 */
export class FileProfileStore implements ProfileStore {
  private readonly storageDir: string;

  constructor(storageDir: string) {
    this.storageDir = path.resolve(storageDir);
    this.ensureStorageDir();
  }

  async getProfile(userId: string): Promise<StoredProfile | undefined> {
    return this.readRecord(userId);
  }

  async putProfile(userId: string, profile: UserProfile, expectedRevision: number): Promise<PutResult> {
    const currentRevision = this.readRecord(userId)?.revision ?? 0;
    if (currentRevision !== expectedRevision) {
      return { ok: false, conflict: true, currentRevision };
    }

    const revision = currentRevision + 1;
    const filePath = this.getStoragePath(userId);
    const tempPath = `${filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify({ revision, profile }, null, 2), 'utf-8');
    fs.renameSync(tempPath, filePath);
    componentLog('profile', `Stored profile "${userId}" at revision ${revision}`, 'debug');
    return { ok: true, revision };
  }

  listUserIds(): string[] {
    if (!fs.existsSync(this.storageDir)) return [];
    return fs
      .readdirSync(this.storageDir)
      .filter((file) => file.endsWith('.json'))
      .map((file) => decodeURIComponent(file.slice(0, -'.json'.length)));
  }

  remove(userId: string): boolean {
    const filePath = this.getStoragePath(userId);
    if (!fs.existsSync(filePath)) return false;
    fs.unlinkSync(filePath);
    return true;
  }

  private readRecord(userId: string): StoredProfile | undefined {
    const filePath = this.getStoragePath(userId);
    if (!fs.existsSync(filePath)) return undefined;

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      componentLog('profile', `Unreadable profile file ${filePath}: ${describeError(error)}`, 'warn');
      return undefined;
    }
    const record = parseProfileRecord(data);
    if (!record) {
      componentLog('profile', `Profile file ${filePath} does not match the profile schema`, 'warn');
      return undefined;
    }
    return record;
  }

  private getStoragePath(userId: string): string {
    return path.join(this.storageDir, `${encodeURIComponent(userId)}.json`);
  }

  private ensureStorageDir(): void {
    if (!fs.existsSync(this.storageDir)) {
      fs.mkdirSync(this.storageDir, { recursive: true });
    }
  }
}
