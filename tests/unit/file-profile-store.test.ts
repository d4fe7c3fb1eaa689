import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { FileProfileStore } from '../../src/profile/file-profile-store';
import { applyAnalysis } from '../../src/profile/signature-merge';
import { makeRecord } from '../helpers';

describe('FileProfileStore', () => {
  let tempDir: string;
  let store: FileProfileStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stylewise-store-'));
    store = new FileProfileStore(path.join(tempDir, 'profiles'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create the storage directory', () => {
    expect(fs.existsSync(path.join(tempDir, 'profiles'))).toBe(true);
  });

  it('should store and retrieve a profile with its revision', async () => {
    const profile = applyAnalysis(undefined, makeRecord(), 20);

    expect(await store.putProfile('alice', profile, 0)).toEqual({ ok: true, revision: 1 });
    expect(await store.getProfile('alice')).toEqual({ profile, revision: 1 });
  });

  it('should refuse a write against a stale revision', async () => {
    const profile = applyAnalysis(undefined, makeRecord(), 20);
    await store.putProfile('alice', profile, 0);

    expect(await store.putProfile('alice', profile, 0)).toEqual({ ok: false, conflict: true, currentRevision: 1 });
    expect(await store.putProfile('alice', profile, 1)).toEqual({ ok: true, revision: 2 });
  });

  it('should persist across instances', async () => {
    const profile = applyAnalysis(undefined, makeRecord(), 20);
    await store.putProfile('alice', profile, 0);

    const reopened = new FileProfileStore(path.join(tempDir, 'profiles'));
    expect((await reopened.getProfile('alice'))?.profile.totalAnalyses).toBe(1);
  });

  it('should encode user ids into safe file names', async () => {
    const profile = applyAnalysis(undefined, makeRecord({ userId: 'team/alice' }), 20);
    await store.putProfile('team/alice', profile, 0);

    expect(fs.existsSync(path.join(tempDir, 'profiles', 'team%2Falice.json'))).toBe(true);
    expect(store.listUserIds()).toEqual(['team/alice']);
  });

  it('should treat unreadable or invalid files as missing', async () => {
    fs.writeFileSync(path.join(tempDir, 'profiles', 'broken.json'), '{ not json', 'utf-8');
    fs.writeFileSync(path.join(tempDir, 'profiles', 'wrong.json'), JSON.stringify({ revision: 1 }), 'utf-8');

    expect(await store.getProfile('broken')).toBeUndefined();
    expect(await store.getProfile('wrong')).toBeUndefined();
  });

  it('should remove a stored profile', async () => {
    await store.putProfile('alice', applyAnalysis(undefined, makeRecord(), 20), 0);

    expect(store.remove('alice')).toBe(true);
    expect(store.remove('alice')).toBe(false);
    expect(await store.getProfile('alice')).toBeUndefined();
  });
});
