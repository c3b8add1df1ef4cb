/**
 * Explicit source registry, built once at startup and handed to the engine
 * through its context.
 */

import type { SourceId } from '../types/entities.js';
import type { AvailabilitySource } from './availabilitySource.js';

export class SourceRegistry {
  private readonly adapters = new Map<SourceId, AvailabilitySource>();

  register(sourceId: SourceId, adapter: AvailabilitySource): this {
    if (this.adapters.has(sourceId)) {
      throw new Error(`Source already registered: ${sourceId}`);
    }
    this.adapters.set(sourceId, adapter);
    return this;
  }

  get(sourceId: SourceId): AvailabilitySource | undefined {
    return this.adapters.get(sourceId);
  }

  has(sourceId: SourceId): boolean {
    return this.adapters.has(sourceId);
  }

  /**
   * Registered source ids in registration order
   */
  sourceIds(): SourceId[] {
    return [...this.adapters.keys()];
  }

  get size(): number {
    return this.adapters.size;
  }
}
