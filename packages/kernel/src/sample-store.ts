// =============================================================================
// SeqTape - Sample Store
// =============================================================================
// Arena pair shared by a family of chains.

import {
  SHARING,
  DEFAULT_SEGMENT_CAPACITY,
  DEFAULT_BUFFER_CAPACITY
} from './constants'
import type { SharingPolicy } from './constants'
import { BufferArena } from './buffer-arena'
import { SegmentArena } from './segment-arena'
import { PositionResolver } from './position-resolver'
import { SampleChain } from './sample-chain'
import type { StoreConfig } from './types'

/**
 * Default configuration values.
 */
export const DEFAULT_STORE_CONFIG: Required<StoreConfig> = {
  segmentCapacity: DEFAULT_SEGMENT_CAPACITY,
  bufferCapacity: DEFAULT_BUFFER_CAPACITY,
  sharing: SHARING.COPY
}

/**
 * Sample Store.
 *
 * Owns the segment and buffer arenas for every chain it creates. Backing
 * buffers can only be shared between chains of the same store; inserting
 * from a chain of another store always copies.
 *
 * Single-threaded: callers serialize all access to a store and its chains.
 */
export class SampleStore {
  readonly segments: SegmentArena
  readonly buffers: BufferArena
  readonly resolver: PositionResolver
  private readonly config: Required<StoreConfig>

  /**
   * @param config - Optional configuration overrides
   */
  constructor(config?: StoreConfig) {
    this.config = { ...DEFAULT_STORE_CONFIG, ...config }
    this.segments = new SegmentArena(this.config.segmentCapacity)
    this.buffers = new BufferArena(this.config.bufferCapacity)
    this.resolver = new PositionResolver(this.segments)
  }

  /**
   * Create a new, empty chain backed by this store.
   */
  createChain(): SampleChain {
    return new SampleChain(this)
  }

  getSharingPolicy(): SharingPolicy {
    return this.config.sharing
  }

  getConfig(): Readonly<Required<StoreConfig>> {
    return this.config
  }

  /**
   * Live segments across all chains of the store.
   */
  getSegmentCount(): number {
    return this.segments.getLiveCount()
  }

  /**
   * Live backing buffers across all chains of the store.
   */
  getBufferCount(): number {
    return this.buffers.getLiveCount()
  }
}
