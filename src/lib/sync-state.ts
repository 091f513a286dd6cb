/**
 * Per-bridge watermarks kept between runs
 */

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { z } from 'zod';
import { StorageFailureError, errorMessage } from './errors';

const bridgeStateSchema = z.object({
  lastImport: z.string().datetime().optional(),
  lastExport: z.string().datetime().optional(),
});

const syncStateSchema = z.record(bridgeStateSchema);

export type BridgeSyncState = z.infer<typeof bridgeStateSchema>;
export type SyncState = z.infer<typeof syncStateSchema>;

export const SYNC_STATE_FILE = 'sync-state.json';

export class SyncStateStore {
  private stateFile: string;

  constructor(dataDir: string) {
    this.stateFile = path.join(dataDir, SYNC_STATE_FILE);
  }

  /**
   * Load state; an unreadable file starts fresh
   */
  load(): SyncState {
    if (!fs.existsSync(this.stateFile)) {
      return {};
    }

    try {
      const content = fs.readFileSync(this.stateFile, 'utf-8');
      return syncStateSchema.parse(JSON.parse(content));
    } catch (error) {
      console.warn(chalk.yellow(`⚠ Failed to load sync state, starting fresh (${errorMessage(error)})`));
      return {};
    }
  }

  get(bridge: string): BridgeSyncState {
    return this.load()[bridge] ?? {};
  }

  /** Watermark for the next pull, if any */
  lastImport(bridge: string): Date | undefined {
    const value = this.get(bridge).lastImport;
    return value ? new Date(value) : undefined;
  }

  recordImport(bridge: string, at: Date): void {
    this.update(bridge, { lastImport: at.toISOString() });
  }

  recordExport(bridge: string, at: Date): void {
    this.update(bridge, { lastExport: at.toISOString() });
  }

  private update(bridge: string, changes: BridgeSyncState): void {
    const state = this.load();
    state[bridge] = { ...state[bridge], ...changes };
    this.save(state);
  }

  private save(state: SyncState): void {
    try {
      fs.mkdirSync(path.dirname(this.stateFile), { recursive: true });
      fs.writeFileSync(this.stateFile, JSON.stringify(state, null, 2), 'utf-8');
    } catch (error) {
      throw new StorageFailureError(`cannot write sync state: ${errorMessage(error)}`, { cause: error });
    }
  }
}
