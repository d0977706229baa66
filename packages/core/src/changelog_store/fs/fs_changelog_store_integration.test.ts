/**
 * FsChangelogStore Integration Tests
 *
 * Runs against a real temporary directory, without mocking fs.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsChangelogStore } from './fs_changelog_store';

describe('FsChangelogStore (real filesystem)', () => {
  let tempDir: string;
  let store: FsChangelogStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-changelog-store-test-'));
    store = new FsChangelogStore(path.join(tempDir, 'SPECS', 'gitlog'), path.join(tempDir, 'SPECS', 'containerd.spec'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('WHEN neither file exists THE SYSTEM SHALL read an empty log and no spec', async () => {
    await expect(store.readLog()).resolves.toBe('');
    await expect(store.readSpec()).resolves.toBeNull();
  });

  it('should create the log directory on first write and append after it', async () => {
    await store.writeLog('first\n');
    await store.appendLog('second\n');

    await expect(store.readLog()).resolves.toBe('first\nsecond\n');
  });
});
