// =============================================================================
// SeqTape - Kernel Constants
// =============================================================================
// Arena layout defaults, flags and result codes for the segment engine.

/**
 * Null pointer value (end of chain / empty chain / no buffer).
 * Arena slot 0 is reserved so that every live pointer is positive.
 */
export const NULL_PTR = 0

/**
 * Smallest representable sample (int16).
 */
export const SAMPLE_MIN = -32768

/**
 * Largest representable sample (int16).
 */
export const SAMPLE_MAX = 32767

/**
 * Default number of segment slots reserved by a new store.
 */
export const DEFAULT_SEGMENT_CAPACITY = 64

/**
 * Default number of buffer slots reserved by a new store.
 */
export const DEFAULT_BUFFER_CAPACITY = 16

/**
 * Default sample preview length for `SampleChain.describe()`.
 */
export const DEFAULT_DESCRIBE_SAMPLES = 10

// =============================================================================
// Segment Flags
// =============================================================================

/**
 * Per-segment flag bits (SegmentArena `flags` column).
 */
export const SEG_FLAG = {
  /** No flags */
  NONE: 0,
  /** Segment reads through a buffer lent by another chain (shared insert) */
  BORROWED: 1 << 0
} as const

// =============================================================================
// Sharing Policy
// =============================================================================

/**
 * How `SampleChain.insert()` materializes the inserted span.
 *
 * - `copy`: one freshly owned buffer holding a copy of the span (default)
 * - `share`: borrowed segments referencing the source buffers; arms the
 *   dependency guard on the source chain
 */
export const SHARING = {
  COPY: 'copy',
  SHARE: 'share'
} as const

// =============================================================================
// Result Codes
// =============================================================================

/**
 * Edit result codes.
 *
 * `write()` returns one of these; `insert()` returns a sample count on
 * success or one of the negative codes; `deleteRange()` returns a boolean
 * and records the code in the chain's error flag.
 */
export const EDIT = {
  /** Edit applied */
  OK: 0,
  /** Position or span outside the range valid for the operation */
  OUT_OF_BOUNDS: -1,
  /** Negative, fractional or non-finite position/length */
  INVALID_ARGUMENT: -2,
  /** Deletion would shrink a buffer another chain still reads through */
  DEPENDENCY_CONFLICT: -3
} as const

/**
 * Chain validation codes returned by `SampleChain.validate()`.
 */
export const CHAIN_ERR = {
  /** Chain is consistent */
  OK: 0,
  /** A linked segment has length <= 0 */
  EMPTY_SEGMENT: 1,
  /** A segment's logicalStart differs from the sum of preceding lengths */
  DISCONTIGUOUS: 2,
  /** offset + length exceeds the backing buffer */
  BUFFER_OVERRUN: 3,
  /** A segment references a released buffer handle */
  DEAD_BUFFER: 4,
  /** Cached total length differs from the traversal sum */
  LENGTH_MISMATCH: 5,
  /** Traversal visited more segments than the arena holds */
  CYCLE: 6
} as const

/**
 * Buffer arena result codes.
 */
export const BUFFER_ERR = {
  /** Handle is NULL, out of range or already released */
  INVALID_HANDLE: -1
} as const

export type SegmentFlag = (typeof SEG_FLAG)[keyof typeof SEG_FLAG]
export type SharingPolicy = (typeof SHARING)[keyof typeof SHARING]
export type EditCode = (typeof EDIT)[keyof typeof EDIT]
export type ChainErrorCode = (typeof CHAIN_ERR)[keyof typeof CHAIN_ERR]
