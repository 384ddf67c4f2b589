import type { SharingPolicy } from './constants'

/**
 * Segment pointer type (slot index into a SegmentArena).
 * 0 indicates null/end-of-chain.
 */
export type SegmentPtr = number

/**
 * Buffer handle type (slot index into a BufferArena).
 * 0 indicates no buffer.
 */
export type BufferHandle = number

/**
 * Anything a chain can copy samples from.
 * Values are stored with Int16Array conversion semantics.
 */
export type SampleSource = Int16Array | ArrayLike<number>

/**
 * Sample store configuration options.
 */
export interface StoreConfig {
  /** Initial segment slots (default: 64, grows by doubling) */
  segmentCapacity?: number
  /** Initial buffer slots (default: 16, grows by doubling) */
  bufferCapacity?: number
  /** Insert materialization policy (default: 'copy') */
  sharing?: SharingPolicy
}

/**
 * Segment visitor for `SampleChain.traverse()`.
 *
 * Receives segment fields as primitives; the same callback may be reused
 * across traversals.
 */
export type SegmentCallback = (
  ptr: SegmentPtr,
  buffer: BufferHandle,
  offset: number,
  length: number,
  logicalStart: number,
  flags: number
) => void

/**
 * Editable sample sequence.
 */
export interface ISampleChain {
  /** Total number of samples. */
  length(): number
  /** Copy up to `len` samples from `start`; truncates at the end of the chain. */
  read(start: number, len: number): Int16Array
  /** Copy into `dest`; returns the number of samples copied. */
  readInto(dest: Int16Array, start: number, len?: number): number
  /** Overwrite/extend from `pos`. Returns an EDIT code. */
  write(src: SampleSource, pos: number): number
  /** Remove `len` samples at `pos`. Returns false if rejected (chain unchanged). */
  deleteRange(pos: number, len: number): boolean
  /** Splice `src[srcPos, srcPos+len)` at `destPos`. Returns samples inserted or a negative EDIT code. */
  insert(src: ISampleChain, destPos: number, srcPos: number, len: number): number
  /** Read the whole chain. */
  toArray(): Int16Array
}
