// =============================================================================
// SeqTape - Kernel
// =============================================================================
// Segmented sample sequence engine.

// Main classes
export { SampleStore, DEFAULT_STORE_CONFIG } from './sample-store'
export { SampleChain } from './sample-chain'

// Constants
export {
  NULL_PTR,
  SAMPLE_MIN,
  SAMPLE_MAX,
  DEFAULT_SEGMENT_CAPACITY,
  DEFAULT_BUFFER_CAPACITY,
  DEFAULT_DESCRIBE_SAMPLES,
  SEG_FLAG,
  SHARING,
  EDIT,
  CHAIN_ERR,
  BUFFER_ERR
} from './constants'

// Types from constants
export type { SegmentFlag, SharingPolicy, EditCode, ChainErrorCode } from './constants'

// Types from types module
export type {
  SegmentPtr,
  BufferHandle,
  SampleSource,
  StoreConfig,
  SegmentCallback,
  ISampleChain
} from './types'

// Low-level components (for advanced use)
export { SegmentArena } from './segment-arena'
export { BufferArena } from './buffer-arena'
export { PositionResolver } from './position-resolver'
