// =============================================================================
// SeqTape - Segment Arena
// =============================================================================
// Structure-of-arrays storage for segments with a LIFO free list.

import { NULL_PTR, SEG_FLAG, DEFAULT_SEGMENT_CAPACITY } from './constants'
import type { SegmentPtr, BufferHandle } from './types'

/**
 * Segment Arena.
 *
 * Every segment of every chain in a store lives in one slot of these
 * parallel columns:
 *
 * | column         | meaning                                          |
 * | -------------- | ------------------------------------------------ |
 * | `buffer`       | BufferHandle of the backing storage              |
 * | `offset`       | first sample of this segment inside the buffer   |
 * | `length`       | samples contributed to the chain                 |
 * | `logicalStart` | cached first logical index within the chain      |
 * | `next`         | next segment in the chain (NULL_PTR at the tail) |
 * | `flags`        | SEG_FLAG bits                                    |
 *
 * Chains are singly linked through `next`. Splitting, splicing and unlinking
 * are index edits on these columns; no object is created per segment.
 *
 * Free slots are chained through their `next` column (free-list head in
 * `freeHead`). Slot 0 is the null sentinel and is never allocated.
 */
export class SegmentArena {
  private buffer: Int32Array
  private offset: Int32Array
  private length: Int32Array
  private logicalStart: Float64Array
  private next: Int32Array
  private flags: Uint8Array

  private freeHead: SegmentPtr = NULL_PTR
  private liveCount: number = 0

  /**
   * @param capacity - Initial number of segment slots (excluding the null slot)
   */
  constructor(capacity: number = DEFAULT_SEGMENT_CAPACITY) {
    const slots = Math.max(1, capacity) + 1
    this.buffer = new Int32Array(slots)
    this.offset = new Int32Array(slots)
    this.length = new Int32Array(slots)
    this.logicalStart = new Float64Array(slots)
    this.next = new Int32Array(slots)
    this.flags = new Uint8Array(slots)
    this.linkFreeSlots(1, slots)
  }

  // ===========================================================================
  // Allocation
  // ===========================================================================

  /**
   * Allocate a zeroed, unlinked segment.
   * Grows the arena (doubling) when the free list is empty.
   *
   * @returns Pointer to the new segment
   */
  alloc(): SegmentPtr {
    if (this.freeHead === NULL_PTR) {
      this.grow()
    }
    const ptr = this.freeHead
    this.freeHead = this.next[ptr]
    this.zeroSegment(ptr)
    this.liveCount++
    return ptr
  }

  /**
   * Allocate and initialize a segment in one call.
   */
  create(
    buffer: BufferHandle,
    offset: number,
    length: number,
    flags: number = SEG_FLAG.NONE
  ): SegmentPtr {
    const ptr = this.alloc()
    this.buffer[ptr] = buffer
    this.offset[ptr] = offset
    this.length[ptr] = length
    this.flags[ptr] = flags
    return ptr
  }

  /**
   * Return a segment slot to the free list.
   * The caller is responsible for unlinking it and releasing its buffer.
   */
  free(ptr: SegmentPtr): void {
    if (ptr === NULL_PTR) return
    this.zeroSegment(ptr)
    this.next[ptr] = this.freeHead
    this.freeHead = ptr
    this.liveCount--
  }

  // ===========================================================================
  // Field Access
  // ===========================================================================

  getBuffer(ptr: SegmentPtr): BufferHandle {
    return this.buffer[ptr]
  }

  setBuffer(ptr: SegmentPtr, handle: BufferHandle): void {
    this.buffer[ptr] = handle
  }

  getOffset(ptr: SegmentPtr): number {
    return this.offset[ptr]
  }

  setOffset(ptr: SegmentPtr, offset: number): void {
    this.offset[ptr] = offset
  }

  getLength(ptr: SegmentPtr): number {
    return this.length[ptr]
  }

  setLength(ptr: SegmentPtr, length: number): void {
    this.length[ptr] = length
  }

  getLogicalStart(ptr: SegmentPtr): number {
    return this.logicalStart[ptr]
  }

  setLogicalStart(ptr: SegmentPtr, start: number): void {
    this.logicalStart[ptr] = start
  }

  getNext(ptr: SegmentPtr): SegmentPtr {
    return this.next[ptr]
  }

  setNext(ptr: SegmentPtr, next: SegmentPtr): void {
    this.next[ptr] = next
  }

  getFlags(ptr: SegmentPtr): number {
    return this.flags[ptr]
  }

  setFlags(ptr: SegmentPtr, flags: number): void {
    this.flags[ptr] = flags
  }

  isBorrowed(ptr: SegmentPtr): boolean {
    return (this.flags[ptr] & SEG_FLAG.BORROWED) !== 0
  }

  // ===========================================================================
  // Telemetry
  // ===========================================================================

  /**
   * Number of allocated (live) segments across all chains.
   */
  getLiveCount(): number {
    return this.liveCount
  }

  /**
   * Current slot capacity (excluding the null slot).
   */
  getCapacity(): number {
    return this.next.length - 1
  }

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  private zeroSegment(ptr: SegmentPtr): void {
    this.buffer[ptr] = NULL_PTR
    this.offset[ptr] = 0
    this.length[ptr] = 0
    this.logicalStart[ptr] = 0
    this.next[ptr] = NULL_PTR
    this.flags[ptr] = SEG_FLAG.NONE
  }

  /**
   * Push slots [from, to) onto the free list, lowest index on top.
   */
  private linkFreeSlots(from: number, to: number): void {
    for (let ptr = to - 1; ptr >= from; ptr--) {
      this.next[ptr] = this.freeHead
      this.freeHead = ptr
    }
  }

  private grow(): void {
    const oldSlots = this.next.length
    const newSlots = oldSlots * 2

    this.buffer = resizeInt32(this.buffer, newSlots)
    this.offset = resizeInt32(this.offset, newSlots)
    this.length = resizeInt32(this.length, newSlots)
    this.next = resizeInt32(this.next, newSlots)

    const logicalStart = new Float64Array(newSlots)
    logicalStart.set(this.logicalStart)
    this.logicalStart = logicalStart

    const flags = new Uint8Array(newSlots)
    flags.set(this.flags)
    this.flags = flags

    this.linkFreeSlots(oldSlots, newSlots)
  }
}

function resizeInt32(src: Int32Array, size: number): Int32Array {
  const out = new Int32Array(size)
  out.set(src)
  return out
}
