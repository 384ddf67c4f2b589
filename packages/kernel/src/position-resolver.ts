// =============================================================================
// SeqTape - Position Resolver
// =============================================================================

import { NULL_PTR } from './constants'
import type { SegmentArena } from './segment-arena'
import type { SegmentPtr } from './types'

/**
 * Maps logical sample indices to (segment, local offset) pairs.
 *
 * Traversal is linear from the head, which is why every chain operation is
 * O(segments touched). The local offset of the last successful `resolve()`
 * is kept on the resolver instead of being returned in a fresh object.
 */
export class PositionResolver {
  private readonly arena: SegmentArena

  /** Local offset of the segment found by the last `resolve()` (0 when not found). */
  localOffset: number = 0

  constructor(arena: SegmentArena) {
    this.arena = arena
  }

  /**
   * Find the segment containing logical index `pos`.
   *
   * Relies on cached `logicalStart` values, so the chain must be reindexed
   * after structural edits before resolving again.
   *
   * @param head - First segment of the chain
   * @param pos - Logical sample index
   * @returns Segment pointer, or NULL_PTR if `pos` is past the end
   */
  resolve(head: SegmentPtr, pos: number): SegmentPtr {
    const arena = this.arena
    let ptr = head

    while (ptr !== NULL_PTR) {
      const start = arena.getLogicalStart(ptr)
      if (pos >= start && pos < start + arena.getLength(ptr)) {
        this.localOffset = pos - start
        return ptr
      }
      ptr = arena.getNext(ptr)
    }

    this.localOffset = 0
    return NULL_PTR
  }

  /**
   * Find the segment linked before `target`.
   *
   * @returns Predecessor, or NULL_PTR if `target` is the head (or absent)
   */
  findPrev(head: SegmentPtr, target: SegmentPtr): SegmentPtr {
    if (head === target) return NULL_PTR

    let ptr = head
    while (ptr !== NULL_PTR) {
      const next = this.arena.getNext(ptr)
      if (next === target) return ptr
      ptr = next
    }
    return NULL_PTR
  }

  /**
   * Find the last segment of a chain.
   *
   * @returns Tail pointer, or NULL_PTR for an empty chain
   */
  findTail(head: SegmentPtr): SegmentPtr {
    let ptr = head
    while (ptr !== NULL_PTR) {
      const next = this.arena.getNext(ptr)
      if (next === NULL_PTR) return ptr
      ptr = next
    }
    return NULL_PTR
  }
}
