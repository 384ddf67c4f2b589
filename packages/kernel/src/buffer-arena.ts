// =============================================================================
// SeqTape - Buffer Arena
// =============================================================================
// Handle-addressed backing storage with reference and borrow counting.

import { NULL_PTR, BUFFER_ERR, DEFAULT_BUFFER_CAPACITY } from './constants'
import type { BufferHandle } from './types'

const EMPTY = new Int16Array(0)

/**
 * Buffer Arena - owner of every backing sample buffer in a store.
 *
 * Segments never point at each other to express sharing. Each segment holds
 * a handle; the arena keeps two counters per handle:
 *
 * - **refs:** every segment referencing the buffer (split pieces, owners and
 *   borrowers alike). The slot is recycled when this drops to zero, so the
 *   buffer lives as long as its longest holder.
 * - **borrows:** segments that reference the buffer through a shared insert
 *   from another chain. While non-zero, destructive in-place edits by the
 *   lending chain are rejected (dependency guard).
 *
 * Free handles are kept on a LIFO stack; slot 0 is never handed out.
 */
export class BufferArena {
  private buffers: Int16Array[]
  private refs: Int32Array
  private borrows: Int32Array
  private freeHandles: number[] = []
  private liveCount: number = 0

  /**
   * @param capacity - Initial number of buffer slots (excluding the null slot)
   */
  constructor(capacity: number = DEFAULT_BUFFER_CAPACITY) {
    const slots = Math.max(1, capacity) + 1
    this.buffers = new Array<Int16Array>(slots).fill(EMPTY)
    this.refs = new Int32Array(slots)
    this.borrows = new Int32Array(slots)

    // Highest handle on top so allocation hands out 1, 2, 3...
    for (let h = slots - 1; h > NULL_PTR; h--) {
      this.freeHandles.push(h)
    }
  }

  // ===========================================================================
  // Allocation
  // ===========================================================================

  /**
   * Allocate a zero-filled buffer with one reference.
   *
   * @param size - Number of samples
   * @returns Handle of the new buffer
   */
  alloc(size: number): BufferHandle {
    return this.adopt(new Int16Array(size))
  }

  /**
   * Register an existing array as a new buffer with one reference.
   * The arena takes ownership; the caller must not keep writing to it.
   *
   * @param data - Sample storage to adopt
   * @returns Handle of the new buffer
   */
  adopt(data: Int16Array): BufferHandle {
    if (this.freeHandles.length === 0) {
      this.grow()
    }
    const handle = this.freeHandles.pop() ?? NULL_PTR
    this.buffers[handle] = data
    this.refs[handle] = 1
    this.borrows[handle] = 0
    this.liveCount++
    return handle
  }

  /**
   * Add a reference to a live buffer (e.g. a split piece).
   *
   * @returns New reference count, or BUFFER_ERR.INVALID_HANDLE
   */
  retain(handle: BufferHandle): number {
    if (!this.isLive(handle)) return BUFFER_ERR.INVALID_HANDLE
    this.refs[handle]++
    return this.refs[handle]
  }

  /**
   * Drop a reference. The slot is recycled when no reference remains.
   *
   * @returns Remaining reference count, or BUFFER_ERR.INVALID_HANDLE
   */
  release(handle: BufferHandle): number {
    if (!this.isLive(handle)) return BUFFER_ERR.INVALID_HANDLE
    const remaining = --this.refs[handle]
    if (remaining === 0) {
      this.buffers[handle] = EMPTY
      this.borrows[handle] = 0
      this.freeHandles.push(handle)
      this.liveCount--
    }
    return remaining
  }

  /**
   * Add a borrowed reference (counts as a reference too).
   *
   * @returns New borrow count, or BUFFER_ERR.INVALID_HANDLE
   */
  borrow(handle: BufferHandle): number {
    if (!this.isLive(handle)) return BUFFER_ERR.INVALID_HANDLE
    this.refs[handle]++
    return ++this.borrows[handle]
  }

  /**
   * Drop a borrowed reference.
   *
   * @returns Remaining reference count, or BUFFER_ERR.INVALID_HANDLE
   */
  unborrow(handle: BufferHandle): number {
    if (!this.isLive(handle) || this.borrows[handle] === 0) {
      return BUFFER_ERR.INVALID_HANDLE
    }
    this.borrows[handle]--
    return this.release(handle)
  }

  // ===========================================================================
  // Access
  // ===========================================================================

  /**
   * Get the sample storage behind a handle (empty array for dead handles).
   */
  getData(handle: BufferHandle): Int16Array {
    return this.isLive(handle) ? this.buffers[handle] : EMPTY
  }

  isLive(handle: BufferHandle): boolean {
    return handle > NULL_PTR && handle < this.refs.length && this.refs[handle] > 0
  }

  getRefCount(handle: BufferHandle): number {
    return this.isLive(handle) ? this.refs[handle] : 0
  }

  getBorrowCount(handle: BufferHandle): number {
    return this.isLive(handle) ? this.borrows[handle] : 0
  }

  /**
   * Number of live buffers.
   */
  getLiveCount(): number {
    return this.liveCount
  }

  /**
   * Current slot capacity (excluding the null slot).
   */
  getCapacity(): number {
    return this.refs.length - 1
  }

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  private grow(): void {
    const oldSlots = this.refs.length
    const newSlots = oldSlots * 2

    const refs = new Int32Array(newSlots)
    refs.set(this.refs)
    this.refs = refs

    const borrows = new Int32Array(newSlots)
    borrows.set(this.borrows)
    this.borrows = borrows

    for (let h = oldSlots; h < newSlots; h++) {
      this.buffers.push(EMPTY)
    }
    for (let h = newSlots - 1; h >= oldSlots; h--) {
      this.freeHandles.push(h)
    }
  }
}
