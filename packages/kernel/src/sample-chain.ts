// =============================================================================
// SeqTape - Sample Chain
// =============================================================================
// Editable sample track as a singly-linked chain of arena segments.

import {
  NULL_PTR,
  SEG_FLAG,
  SHARING,
  EDIT,
  CHAIN_ERR,
  DEFAULT_DESCRIBE_SAMPLES
} from './constants'
import type { ChainErrorCode } from './constants'
import type { SegmentArena } from './segment-arena'
import type { BufferArena } from './buffer-arena'
import type { PositionResolver } from './position-resolver'
import type { SampleStore } from './sample-store'
import type {
  SegmentPtr,
  SampleSource,
  SegmentCallback,
  ISampleChain
} from './types'

/**
 * Sample Chain - one editable track.
 *
 * The chain owns its segments (slots in the store's SegmentArena) and holds
 * buffer references through the store's BufferArena. Traversal order from
 * `head` is the only source of truth; `totalLength` and every segment's
 * `logicalStart` are caches rebuilt by a full walk after each structural
 * change (extend, split, delete, insert).
 *
 * **Result convention:** domain failures are returned, never thrown.
 * - `write()` returns an EDIT code
 * - `insert()` returns the number of samples inserted or a negative EDIT code
 * - `deleteRange()` returns a boolean; the reason is in `getError()`
 *
 * **Sharing:** under the store's `share` policy, `insert()` from another
 * chain of the same store creates borrowed segments that read through the
 * source buffers. Writes into shared storage detach the written segment onto
 * a private copy first, and deletions that would shrink a lent buffer in
 * place are rejected with EDIT.DEPENDENCY_CONFLICT.
 */
export class SampleChain implements ISampleChain {
  readonly store: SampleStore
  private readonly segments: SegmentArena
  private readonly buffers: BufferArena
  private readonly resolver: PositionResolver

  private head: SegmentPtr = NULL_PTR
  private totalLength: number = 0
  private errorFlag: number = EDIT.OK

  /**
   * Use `SampleStore.createChain()` rather than calling this directly.
   */
  constructor(store: SampleStore) {
    this.store = store
    this.segments = store.segments
    this.buffers = store.buffers
    this.resolver = store.resolver
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  length(): number {
    return this.totalLength
  }

  getHead(): SegmentPtr {
    return this.head
  }

  segmentCount(): number {
    let count = 0
    let ptr = this.head
    while (ptr !== NULL_PTR) {
      count++
      ptr = this.segments.getNext(ptr)
    }
    return count
  }

  /**
   * Error code of the last edit (EDIT.OK after a successful one).
   */
  getError(): number {
    return this.errorFlag
  }

  clearError(): void {
    this.errorFlag = EDIT.OK
  }

  // ===========================================================================
  // Read
  // ===========================================================================

  /**
   * Read up to `len` samples starting at `start`.
   *
   * Reading past the end yields only the samples that exist; the result is
   * never padded. An empty chain (or `start >= length()`) yields an empty
   * array.
   */
  read(start: number, len: number): Int16Array {
    if (!isIndex(start) || !isIndex(len)) return new Int16Array(0)

    const count = Math.min(len, Math.max(0, this.totalLength - start))
    const out = new Int16Array(count)
    this.copyOut(out, start, count)
    return out
  }

  /**
   * Read into a caller-provided buffer.
   *
   * @param dest - Destination (filled from index 0)
   * @param start - First logical index
   * @param len - Maximum samples to copy (default: dest.length)
   * @returns Number of samples copied
   */
  readInto(dest: Int16Array, start: number, len: number = dest.length): number {
    if (!isIndex(start) || !isIndex(len)) return 0

    const count = Math.min(len, dest.length, Math.max(0, this.totalLength - start))
    this.copyOut(dest, start, count)
    return count
  }

  /**
   * Materialize the whole chain.
   */
  toArray(): Int16Array {
    return this.read(0, this.totalLength)
  }

  // ===========================================================================
  // Write
  // ===========================================================================

  /**
   * Copy `src` into the chain starting at logical position `pos`.
   *
   * Existing samples are overwritten in place. If the write runs past the
   * end, one zero-filled owned segment covering [length(), pos + src.length)
   * is appended first, so any gap before `pos` reads back as zero.
   *
   * @returns EDIT.OK, or EDIT.INVALID_ARGUMENT (chain unchanged)
   */
  write(src: SampleSource, pos: number): number {
    if (!isIndex(pos)) return this.fail(EDIT.INVALID_ARGUMENT)

    const len = src.length
    if (len === 0) return this.succeed()

    const end = pos + len
    if (end > this.totalLength) {
      this.extend(end)
    }

    const segments = this.segments
    let ptr = this.resolver.resolve(this.head, pos)
    let local = this.resolver.localOffset
    let written = 0

    while (ptr !== NULL_PTR && written < len) {
      if (this.isShared(ptr)) {
        this.detach(ptr)
      }

      const take = Math.min(segments.getLength(ptr) - local, len - written)
      const data = this.buffers.getData(segments.getBuffer(ptr))
      const at = segments.getOffset(ptr) + local

      if (src instanceof Int16Array) {
        data.set(src.subarray(written, written + take), at)
      } else {
        for (let i = 0; i < take; i++) {
          data[at + i] = src[written + i]
        }
      }

      written += take
      local = 0
      ptr = segments.getNext(ptr)
    }

    return this.succeed()
  }

  // ===========================================================================
  // Delete
  // ===========================================================================

  /**
   * Remove `len` samples starting at `pos`; later samples shift down by `len`.
   *
   * Two passes: the first checks the whole span against the dependency guard
   * before anything is touched, so a rejected delete leaves the chain as it
   * was. The second shrinks, moves or unlinks segments:
   *
   * - prefix of a segment: advance its offset
   * - suffix or whole segment: shorten it; unlink when it reaches zero
   * - interior of an owned segment: move the tail down inside the segment's
   *   own buffer range
   * - interior of a borrowed segment: split around the hole (the lender's
   *   buffer is never written)
   *
   * @returns true on success; false with EDIT.OUT_OF_BOUNDS,
   *   EDIT.INVALID_ARGUMENT or EDIT.DEPENDENCY_CONFLICT in `getError()`
   */
  deleteRange(pos: number, len: number): boolean {
    if (!isIndex(pos) || !isIndex(len)) {
      this.fail(EDIT.INVALID_ARGUMENT)
      return false
    }
    if (pos + len > this.totalLength) {
      this.fail(EDIT.OUT_OF_BOUNDS)
      return false
    }
    if (len === 0) {
      this.succeed()
      return true
    }

    const segments = this.segments

    // Pass 1: dependency guard across the whole span
    let ptr = this.resolver.resolve(this.head, pos)
    let local = this.resolver.localOffset
    let remaining = len

    while (ptr !== NULL_PTR && remaining > 0) {
      if (!segments.isBorrowed(ptr) && this.buffers.getBorrowCount(segments.getBuffer(ptr)) > 0) {
        this.fail(EDIT.DEPENDENCY_CONFLICT)
        return false
      }
      remaining -= segments.getLength(ptr) - local
      local = 0
      ptr = segments.getNext(ptr)
    }

    // Pass 2: mutate
    ptr = this.resolver.resolve(this.head, pos)
    local = this.resolver.localOffset
    let prev = this.resolver.findPrev(this.head, ptr)
    remaining = len

    while (ptr !== NULL_PTR && remaining > 0) {
      const segLen = segments.getLength(ptr)
      const available = segLen - local
      const next = segments.getNext(ptr)

      if (remaining < available) {
        if (local === 0) {
          segments.setOffset(ptr, segments.getOffset(ptr) + remaining)
          segments.setLength(ptr, segLen - remaining)
        } else if (segments.isBorrowed(ptr)) {
          this.split(ptr, local + remaining)
          segments.setLength(ptr, local)
        } else {
          const data = this.buffers.getData(segments.getBuffer(ptr))
          const base = segments.getOffset(ptr)
          data.copyWithin(base + local, base + local + remaining, base + segLen)
          segments.setLength(ptr, segLen - remaining)
        }
        remaining = 0
        break
      }

      remaining -= available

      if (local === 0) {
        if (prev === NULL_PTR) {
          this.head = next
        } else {
          segments.setNext(prev, next)
        }
        this.releaseSegment(ptr)
      } else {
        segments.setLength(ptr, local)
        prev = ptr
      }

      ptr = next
      local = 0
    }

    this.reindex()
    this.succeed()
    return true
  }

  // ===========================================================================
  // Insert
  // ===========================================================================

  /**
   * Splice `src[srcPos, srcPos + len)` into this chain at `destPos`.
   *
   * The inserted material is built as a self-contained run before this chain
   * is touched, so `src` may be this chain. A source span running past the
   * end of `src` is truncated to the samples that exist.
   *
   * Run construction follows the store's sharing policy:
   * - `copy`: one owned segment holding a copy of the span
   * - `share`: one borrowed segment per source fragment; only when `src` is a
   *   different chain of the same store, otherwise the span is copied
   *
   * @returns Samples inserted (0 for `len === 0`), or EDIT.INVALID_ARGUMENT /
   *   EDIT.OUT_OF_BOUNDS (`destPos > length()` or `srcPos >= src.length()`)
   */
  insert(src: ISampleChain, destPos: number, srcPos: number, len: number): number {
    if (!isIndex(destPos) || !isIndex(srcPos) || !isIndex(len)) {
      return this.fail(EDIT.INVALID_ARGUMENT)
    }
    if (len === 0) return this.succeed()

    const srcLength = src.length()
    if (destPos > this.totalLength || srcPos >= srcLength) {
      return this.fail(EDIT.OUT_OF_BOUNDS)
    }

    const count = Math.min(len, srcLength - srcPos)
    const runHead = this.canBorrowFrom(src)
      ? this.borrowRun(src.getHead(), srcPos, count)
      : this.copyRun(src, srcPos, count)
    const runTail = this.resolver.findTail(runHead)

    // Find the boundary, splitting if it falls inside a segment
    let prev: SegmentPtr
    let next: SegmentPtr
    if (destPos === this.totalLength) {
      prev = this.resolver.findTail(this.head)
      next = NULL_PTR
    } else {
      const at = this.resolver.resolve(this.head, destPos)
      const local = this.resolver.localOffset
      if (local > 0) {
        next = this.split(at, local)
        prev = at
      } else {
        next = at
        prev = this.resolver.findPrev(this.head, at)
      }
    }

    // Splice
    this.segments.setNext(runTail, next)
    if (prev === NULL_PTR) {
      this.head = runHead
    } else {
      this.segments.setNext(prev, runHead)
    }

    this.reindex()
    this.succeed()
    return count
  }

  // ===========================================================================
  // Traversal & Diagnostics
  // ===========================================================================

  /**
   * Visit every segment in chain order.
   */
  traverse(cb: SegmentCallback): void {
    const segments = this.segments
    let ptr = this.head
    while (ptr !== NULL_PTR) {
      cb(
        ptr,
        segments.getBuffer(ptr),
        segments.getOffset(ptr),
        segments.getLength(ptr),
        segments.getLogicalStart(ptr),
        segments.getFlags(ptr)
      )
      ptr = segments.getNext(ptr)
    }
  }

  /**
   * Check the chain invariants.
   *
   * @returns CHAIN_ERR.OK, or the first violation found
   */
  validate(): ChainErrorCode {
    const segments = this.segments
    const limit = segments.getCapacity()
    let expected = 0
    let visited = 0
    let ptr = this.head

    while (ptr !== NULL_PTR) {
      if (++visited > limit) return CHAIN_ERR.CYCLE

      const len = segments.getLength(ptr)
      if (len <= 0) return CHAIN_ERR.EMPTY_SEGMENT
      if (segments.getLogicalStart(ptr) !== expected) return CHAIN_ERR.DISCONTIGUOUS

      const handle = segments.getBuffer(ptr)
      if (!this.buffers.isLive(handle)) return CHAIN_ERR.DEAD_BUFFER
      if (segments.getOffset(ptr) + len > this.buffers.getData(handle).length) {
        return CHAIN_ERR.BUFFER_OVERRUN
      }

      expected += len
      ptr = segments.getNext(ptr)
    }

    return expected === this.totalLength ? CHAIN_ERR.OK : CHAIN_ERR.LENGTH_MISMATCH
  }

  /**
   * Human-readable dump of the segment layout.
   *
   * @example
   * ```
   * Track (total_length=5):
   * [ 1 2 3 ](start: 0, len: 3) [ 4 5 ](start: 3, len: 2)
   * ```
   */
  describe(maxSamples: number = DEFAULT_DESCRIBE_SAMPLES): string {
    const parts: string[] = []
    const segments = this.segments
    let ptr = this.head

    while (ptr !== NULL_PTR) {
      const len = segments.getLength(ptr)
      const shown = Math.min(len, maxSamples)
      const from = segments.getOffset(ptr)
      const data = this.buffers.getData(segments.getBuffer(ptr))

      let text = '[ '
      for (let i = 0; i < shown; i++) {
        text += `${data[from + i]} `
      }
      if (len > shown) text += '... '
      text += `](start: ${segments.getLogicalStart(ptr)}, len: ${len})`
      parts.push(text)

      ptr = segments.getNext(ptr)
    }

    return `Track (total_length=${this.totalLength}):\n${parts.join(' ')}`
  }

  /**
   * Release every segment and buffer reference held by this chain.
   * The chain stays usable and is empty afterwards.
   */
  dispose(): void {
    let ptr = this.head
    while (ptr !== NULL_PTR) {
      const next = this.segments.getNext(ptr)
      this.releaseSegment(ptr)
      ptr = next
    }
    this.head = NULL_PTR
    this.totalLength = 0
    this.errorFlag = EDIT.OK
  }

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  /**
   * Rebuild `logicalStart` of every segment and `totalLength`.
   */
  private reindex(): void {
    const segments = this.segments
    let pos = 0
    let ptr = this.head
    while (ptr !== NULL_PTR) {
      segments.setLogicalStart(ptr, pos)
      pos += segments.getLength(ptr)
      ptr = segments.getNext(ptr)
    }
    this.totalLength = pos
  }

  /**
   * Append one owned, zero-filled segment so the chain reaches `end` samples.
   */
  private extend(end: number): void {
    const size = end - this.totalLength
    const handle = this.buffers.alloc(size)
    const ptr = this.segments.create(handle, 0, size)

    const tail = this.resolver.findTail(this.head)
    if (tail === NULL_PTR) {
      this.head = ptr
    } else {
      this.segments.setNext(tail, ptr)
    }

    this.reindex()
  }

  /**
   * Cut a segment at `local`: `ptr` keeps [0, local), a new segment sharing
   * the same buffer takes the remainder and is linked right after it.
   *
   * @returns The right piece
   */
  private split(ptr: SegmentPtr, local: number): SegmentPtr {
    const segments = this.segments
    const handle = segments.getBuffer(ptr)
    const flags = segments.getFlags(ptr)

    if ((flags & SEG_FLAG.BORROWED) !== 0) {
      this.buffers.borrow(handle)
    } else {
      this.buffers.retain(handle)
    }

    const right = segments.create(
      handle,
      segments.getOffset(ptr) + local,
      segments.getLength(ptr) - local,
      flags
    )
    segments.setLogicalStart(right, segments.getLogicalStart(ptr) + local)
    segments.setNext(right, segments.getNext(ptr))
    segments.setNext(ptr, right)
    segments.setLength(ptr, local)

    return right
  }

  /**
   * True if the segment's storage is visible to another chain.
   */
  private isShared(ptr: SegmentPtr): boolean {
    return (
      this.segments.isBorrowed(ptr) ||
      this.buffers.getBorrowCount(this.segments.getBuffer(ptr)) > 0
    )
  }

  /**
   * Move a segment onto a private copy of its range (copy-on-write).
   */
  private detach(ptr: SegmentPtr): void {
    const segments = this.segments
    const from = segments.getOffset(ptr)
    const copy = this.buffers
      .getData(segments.getBuffer(ptr))
      .slice(from, from + segments.getLength(ptr))

    const handle = this.buffers.adopt(copy)
    this.releaseBuffer(ptr)
    segments.setBuffer(ptr, handle)
    segments.setOffset(ptr, 0)
    segments.setFlags(ptr, segments.getFlags(ptr) & ~SEG_FLAG.BORROWED)
  }

  private releaseBuffer(ptr: SegmentPtr): void {
    const handle = this.segments.getBuffer(ptr)
    if (this.segments.isBorrowed(ptr)) {
      this.buffers.unborrow(handle)
    } else {
      this.buffers.release(handle)
    }
  }

  private releaseSegment(ptr: SegmentPtr): void {
    this.releaseBuffer(ptr)
    this.segments.free(ptr)
  }

  private canBorrowFrom(src: ISampleChain): src is SampleChain {
    return (
      src instanceof SampleChain &&
      src !== this &&
      src.store === this.store &&
      this.store.getSharingPolicy() === SHARING.SHARE
    )
  }

  /**
   * Build a run of borrowed segments over [srcPos, srcPos + count) of a
   * chain in the same store.
   *
   * @returns Head of the run
   */
  private borrowRun(srcHead: SegmentPtr, srcPos: number, count: number): SegmentPtr {
    const segments = this.segments
    let ptr = this.resolver.resolve(srcHead, srcPos)
    let local = this.resolver.localOffset
    let runHead: SegmentPtr = NULL_PTR
    let runTail: SegmentPtr = NULL_PTR
    let remaining = count

    while (ptr !== NULL_PTR && remaining > 0) {
      const take = Math.min(segments.getLength(ptr) - local, remaining)
      const handle = segments.getBuffer(ptr)
      this.buffers.borrow(handle)

      const piece = segments.create(handle, segments.getOffset(ptr) + local, take, SEG_FLAG.BORROWED)
      if (runTail === NULL_PTR) {
        runHead = piece
      } else {
        segments.setNext(runTail, piece)
      }
      runTail = piece

      remaining -= take
      local = 0
      ptr = segments.getNext(ptr)
    }

    return runHead
  }

  /**
   * Build a single owned segment holding a copy of the source span.
   *
   * @returns Head (and only segment) of the run
   */
  private copyRun(src: ISampleChain, srcPos: number, count: number): SegmentPtr {
    const data = new Int16Array(count)
    src.readInto(data, srcPos, count)
    const handle = this.buffers.adopt(data)
    return this.segments.create(handle, 0, count)
  }

  private copyOut(dest: Int16Array, start: number, count: number): void {
    if (count <= 0) return

    const segments = this.segments
    let ptr = this.resolver.resolve(this.head, start)
    let local = this.resolver.localOffset
    let copied = 0

    while (ptr !== NULL_PTR && copied < count) {
      const take = Math.min(segments.getLength(ptr) - local, count - copied)
      const from = segments.getOffset(ptr) + local
      const data = this.buffers.getData(segments.getBuffer(ptr))
      dest.set(data.subarray(from, from + take), copied)

      copied += take
      local = 0
      ptr = segments.getNext(ptr)
    }
  }

  private fail(code: number): number {
    this.errorFlag = code
    return code
  }

  private succeed(): number {
    this.errorFlag = EDIT.OK
    return EDIT.OK
  }
}

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0
}
