// =============================================================================
// SeqTape - Randomized Chain Invariant Tests
// =============================================================================
// Drives chains through random edit sequences and compares them against a
// plain array model after every step.

import {
  SampleStore,
  SampleChain,
  EDIT,
  CHAIN_ERR,
  SHARING
} from '../index'
import type { SharingPolicy } from '../index'
import { SeededRandom } from './seeded-random'

const STEPS = 300

function toInt16(value: number): number {
  return (value << 16) >> 16
}

/**
 * Check caches against a full walk: every segment non-empty and each
 * logicalStart equal to the sum of the lengths before it.
 */
function expectContiguous(chain: SampleChain): void {
  let expected = 0
  chain.traverse((_ptr, _buffer, _offset, length, logicalStart) => {
    expect(length).toBeGreaterThan(0)
    expect(logicalStart).toBe(expected)
    expected += length
  })
  expect(expected).toBe(chain.length())
}

function expectMatchesModel(chain: SampleChain, model: number[]): void {
  expect(chain.length()).toBe(model.length)
  expect(Array.from(chain.toArray())).toEqual(model)
  expect(chain.validate()).toBe(CHAIN_ERR.OK)
  expectContiguous(chain)
}

function runSequence(policy: SharingPolicy, seed: number): void {
  const rng = new SeededRandom(seed)
  const store = new SampleStore({ sharing: policy, segmentCapacity: 4, bufferCapacity: 2 })
  const chains = [store.createChain(), store.createChain()]
  const models: number[][] = [[], []]

  for (let step = 0; step < STEPS; step++) {
    const which = rng.int(0, 1)
    const chain = chains[which]
    const model = models[which]
    const op = rng.int(0, 2)

    if (op === 0) {
      const pos = rng.int(0, model.length + 3)
      const samples = rng.samples(rng.int(1, 6))
      const before = chain.length()

      expect(chain.write(samples, pos)).toBe(EDIT.OK)

      while (model.length < pos) model.push(0)
      samples.forEach((s, i) => {
        model[pos + i] = toInt16(s)
      })
      expect(chain.length()).toBe(Math.max(before, pos + samples.length))
    } else if (op === 1) {
      if (model.length === 0) continue
      const pos = rng.int(0, model.length - 1)
      const len = rng.int(0, model.length - pos)
      const snapshot = model.slice()

      if (chain.deleteRange(pos, len)) {
        model.splice(pos, len)
      } else {
        expect(policy).toBe(SHARING.SHARE)
        expect(chain.getError()).toBe(EDIT.DEPENDENCY_CONFLICT)
        expect(Array.from(chain.toArray())).toEqual(snapshot)
      }
    } else {
      const srcIndex = rng.int(0, 1)
      const src = chains[srcIndex]
      const srcModel = models[srcIndex]
      if (srcModel.length === 0) continue
      const destPos = rng.int(0, model.length)
      const srcPos = rng.int(0, srcModel.length - 1)
      const len = rng.int(1, srcModel.length - srcPos + 2)
      const span = srcModel.slice(srcPos, srcPos + len)

      expect(chain.insert(src, destPos, srcPos, len)).toBe(span.length)
      model.splice(destPos, 0, ...span)
    }

    expectMatchesModel(chains[0], models[0])
    expectMatchesModel(chains[1], models[1])
  }

  chains.forEach((chain) => chain.dispose())
  expect(store.getSegmentCount()).toBe(0)
  expect(store.getBufferCount()).toBe(0)
}

describe('chain invariants under random edits', () => {
  it.each([1, 7, 42, 1234])('copy policy, seed %i', (seed) => {
    runSequence(SHARING.COPY, seed)
  })

  it.each([1, 7, 42, 1234])('share policy, seed %i', (seed) => {
    runSequence(SHARING.SHARE, seed)
  })
})

describe('dependency guard atomicity', () => {
  it('rejects a span that only partly touches a lent buffer without changing anything', () => {
    const store = new SampleStore({ sharing: SHARING.SHARE })
    const src = store.createChain()
    src.write([1, 2, 3], 0)
    src.write([4, 5, 6], 3)

    const dest = store.createChain()
    dest.insert(src, 0, 4, 1)

    // First segment is free to shrink, second is lent: nothing may change
    expect(src.deleteRange(1, 4)).toBe(false)
    expect(src.getError()).toBe(EDIT.DEPENDENCY_CONFLICT)
    expect(Array.from(src.toArray())).toEqual([1, 2, 3, 4, 5, 6])
    expect(src.segmentCount()).toBe(2)
  })
})
