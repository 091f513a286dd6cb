/**
 * JSON dump bridge (import only)
 */

import path from 'path';
import { BridgeConfig } from '../../config';
import { InvalidInputError } from '../../errors';
import { Bridge, BridgeFactory } from '../registry';
import { FILE_TARGET, FileSource } from './file-source';

export { FILE_TARGET, FileSource, dumpSchema } from './file-source';
export type { DumpItem } from './file-source';

/**
 * @param projectRoot - base for relative dump paths
 */
export function createFileBridgeFactory(projectRoot: string): BridgeFactory {
  return {
    target: FILE_TARGET,
    open(config: BridgeConfig): Bridge {
      if (!config.path) {
        throw new InvalidInputError(`file bridge "${config.name}" has no path`);
      }
      const source = new FileSource(path.resolve(projectRoot, config.path));
      return {
        name: config.name,
        target: FILE_TARGET,
        source,
        writer: null,
        verifyAccess: () => source.isReadable(),
      };
    },
  };
}
