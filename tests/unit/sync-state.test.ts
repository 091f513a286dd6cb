import fs from 'fs';
import os from 'os';
import path from 'path';
import { SYNC_STATE_FILE, SyncStateStore } from '../../src/lib/sync-state';

describe('SyncStateStore', () => {
  let dataDir: string;
  let state: SyncStateStore;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tracklog-state-'));
    state = new SyncStateStore(dataDir);
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('should have no watermark before the first pull', () => {
    expect(state.lastImport('upstream')).toBeUndefined();
    expect(state.load()).toEqual({});
  });

  it('should keep watermarks per bridge', () => {
    state.recordImport('upstream', new Date('2024-03-01T10:00:00Z'));
    state.recordExport('upstream', new Date('2024-03-02T10:00:00Z'));
    state.recordImport('dump', new Date('2024-01-01T00:00:00Z'));

    expect(state.lastImport('upstream')).toEqual(new Date('2024-03-01T10:00:00Z'));
    expect(state.get('upstream')).toEqual({
      lastImport: '2024-03-01T10:00:00.000Z',
      lastExport: '2024-03-02T10:00:00.000Z',
    });
    expect(new SyncStateStore(dataDir).lastImport('dump')).toEqual(new Date('2024-01-01T00:00:00Z'));
  });

  it('should start fresh from an unreadable file', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      fs.writeFileSync(path.join(dataDir, SYNC_STATE_FILE), '{ broken');

      expect(state.load()).toEqual({});
      expect(warn).toHaveBeenCalledTimes(1);
    } finally {
      warn.mockRestore();
    }
  });
});
