/**
 * File-backed store: one JSON-lines log per entity and one JSON file per
 * identity under the repository's data directory
 */

import fs from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';
import { CorruptLogError, EntityNotFoundError, InvalidInputError, StorageFailureError, errorMessage } from '../errors';
import { humanId } from '../model/canonical';
import { Identity, decodeIdentity, encodeIdentity } from '../model/identity';
import { Operation, decodeOperation, encodeOperation, hashOperation } from '../model/operation';
import { OperationStore } from './types';

const ID_PATTERN = /^[0-9a-f]{64}$/;

export class FileStore implements OperationStore {
  private entitiesDir: string;
  private identitiesDir: string;

  constructor(dataDir: string) {
    this.entitiesDir = path.join(dataDir, 'entities');
    this.identitiesDir = path.join(dataDir, 'identities');
  }

  async listEntityIds(): Promise<string[]> {
    return this.listIds(this.entitiesDir, '.jsonl');
  }

  async readLog(entityId: string): Promise<Operation[]> {
    const file = this.entityFile(entityId);
    if (!fs.existsSync(file)) {
      throw new EntityNotFoundError(entityId);
    }

    const content = this.readFile(file);
    const operations = content
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line, index) => {
        try {
          return decodeOperation(JSON.parse(line));
        } catch (error) {
          throw new CorruptLogError(
            `entity ${humanId(entityId)}, line ${index + 1}: ${errorMessage(error)}`,
            { cause: error }
          );
        }
      });

    if (operations.length === 0 || hashOperation(operations[0]) !== entityId) {
      throw new CorruptLogError(`entity ${humanId(entityId)} does not match its create operation`);
    }

    return operations;
  }

  /**
   * Rewrite the log through a temporary file and an atomic rename, so a
   * crash leaves either the old or the new log on disk.
   */
  async appendOperations(entityId: string, operations: readonly Operation[]): Promise<void> {
    if (operations.length === 0) return;

    const file = this.entityFile(entityId);
    const exists = fs.existsSync(file);
    if (!exists && hashOperation(operations[0]) !== entityId) {
      throw new InvalidInputError(`new log for ${entityId} must start with its create operation`);
    }

    const existing = exists ? this.readFile(file) : '';
    const lines = operations.map((op) => JSON.stringify(encodeOperation(op))).join('\n');
    const separator = existing === '' || existing.endsWith('\n') ? '' : '\n';

    this.writeAtomic(file, `${existing}${separator}${lines}\n`);
  }

  async listIdentities(): Promise<Identity[]> {
    return this.listIds(this.identitiesDir, '.json').map((id) => {
      const file = path.join(this.identitiesDir, `${id}.json`);
      try {
        return decodeIdentity(JSON.parse(this.readFile(file)));
      } catch (error) {
        throw new CorruptLogError(`identity ${humanId(id)}: ${errorMessage(error)}`, { cause: error });
      }
    });
  }

  async writeIdentity(identity: Identity): Promise<void> {
    const file = path.join(this.identitiesDir, `${identity.id}.json`);
    this.writeAtomic(file, `${JSON.stringify(encodeIdentity(identity), null, 2)}\n`);
  }

  private entityFile(entityId: string): string {
    if (!ID_PATTERN.test(entityId)) {
      throw new InvalidInputError(`invalid entity id: ${entityId}`);
    }
    return path.join(this.entitiesDir, `${entityId}.jsonl`);
  }

  private listIds(dir: string, extension: string): string[] {
    if (!fs.existsSync(dir)) return [];
    try {
      return fs
        .readdirSync(dir)
        .filter((name) => name.endsWith(extension))
        .map((name) => name.slice(0, -extension.length))
        .filter((id) => ID_PATTERN.test(id))
        .sort();
    } catch (error) {
      throw new StorageFailureError(`cannot list ${dir}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private readFile(file: string): string {
    try {
      return fs.readFileSync(file, 'utf-8');
    } catch (error) {
      throw new StorageFailureError(`cannot read ${file}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private writeAtomic(file: string, content: string): void {
    const tmp = `${file}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(tmp, content, 'utf-8');
      fs.renameSync(tmp, file);
    } catch (error) {
      if (fs.existsSync(tmp)) {
        fs.rmSync(tmp, { force: true });
      }
      throw new StorageFailureError(`cannot write ${file}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
