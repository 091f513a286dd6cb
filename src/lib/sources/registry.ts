/**
 * Bridge registry: maps tracker targets to the factories that open them
 */

import { BridgeConfig, BridgeTarget } from '../config';
import { InvalidInputError } from '../errors';
import { RemoteWriter, SourceIterator } from './types';

/**
 * A configured bridge, ready to pull from and push to
 */
export interface Bridge {
  readonly name: string;
  readonly target: BridgeTarget;
  readonly source: SourceIterator;
  /** Null for read-only trackers */
  readonly writer: RemoteWriter | null;
  /** False when the tracker refuses the configured credentials or location */
  verifyAccess(): Promise<boolean>;
}

export interface BridgeFactory {
  readonly target: BridgeTarget;
  open(config: BridgeConfig): Bridge;
}

export class BridgeRegistry {
  private factories = new Map<BridgeTarget, BridgeFactory>();

  /** Register a factory for its target */
  register(factory: BridgeFactory): this {
    this.factories.set(factory.target, factory);
    return this;
  }

  /** Get all registered targets */
  getTargets(): BridgeTarget[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Open a configured bridge through its target's factory
   */
  open(config: BridgeConfig): Bridge {
    const factory = this.factories.get(config.target);
    if (!factory) {
      throw new InvalidInputError(`no bridge registered for target: ${config.target}`);
    }
    return factory.open(config);
  }
}
