import { HIGH, LOW, MAX_CHOICE } from "../ports/bounds"
import type { OscillatorState } from "../ports/state"
import { assertPosition } from "./step"

/** Closed integer interval `[lo, hi]`. */
export type Interval = readonly [lo: number, hi: number]

function normalize(intervals: Interval[]): Interval[] {
  const sorted = [...intervals].sort((a, b) => a[0] - b[0])
  const merged: [number, number][] = []

  for (const [lo, hi] of sorted) {
    const last = merged.at(-1)

    if (last && lo <= last[1] + 1) {
      last[1] = Math.max(last[1], hi)
    } else {
      merged.push([lo, hi])
    }
  }

  return merged
}

function contains(intervals: readonly Interval[], position: number): boolean {
  let lo = 0
  let hi = intervals.length - 1

  while (lo <= hi) {
    const mid = (lo + hi) >> 1
    const interval = intervals[mid]
    if (!interval) return false

    if (position < interval[0]) hi = mid - 1
    else if (position > interval[1]) lo = mid + 1
    else return true
  }

  return false
}

function sameIntervals(a: readonly Interval[], b: readonly Interval[]): boolean {
  return (
    a.length === b.length &&
    a.every((interval, i) => interval[0] === b[i]?.[0] && interval[1] === b[i]?.[1])
  )
}

/**
 * The exact set of states reachable from one start state after some number of
 * steps, over every possible choice sequence.
 *
 * Positions are kept as sorted, disjoint intervals per direction. Moving every
 * state of an interval by every choice in `[0, MAX_CHOICE]` sweeps a contiguous
 * candidate range, so the image of an interval is at most one in-range interval
 * plus one reflected interval heading the other way.
 */
export class ReachableSet {
  private constructor(
    readonly ascending: readonly Interval[],
    readonly descending: readonly Interval[],
  ) {}

  static of(state: OscillatorState): ReachableSet {
    assertPosition(state.position)

    const single: Interval[] = [[state.position, state.position]]

    return state.direction === 1 ? new ReachableSet(single, []) : new ReachableSet([], single)
  }

  has(state: OscillatorState): boolean {
    return contains(state.direction === 1 ? this.ascending : this.descending, state.position)
  }

  isEmpty(): boolean {
    return this.ascending.length === 0 && this.descending.length === 0
  }

  equals(other: ReachableSet): boolean {
    return (
      sameIntervals(this.ascending, other.ascending) &&
      sameIntervals(this.descending, other.descending)
    )
  }

  /** Number of distinct states in the set. */
  get size(): number {
    const count = (intervals: readonly Interval[]) =>
      intervals.reduce((sum, [lo, hi]) => sum + (hi - lo + 1), 0)

    return count(this.ascending) + count(this.descending)
  }

  /**
   * States reachable one step later. Returns `this` once the set has stopped
   * changing.
   */
  advance(): ReachableSet {
    const ascending: Interval[] = []
    const descending: Interval[] = []

    for (const [lo, hi] of this.ascending) {
      const top = hi + MAX_CHOICE

      ascending.push([lo, Math.min(top, HIGH)])
      // Candidates HIGH+1..top land on 2*HIGH-top..HIGH-1, heading down.
      if (top > HIGH) descending.push([2 * HIGH - top, HIGH - 1])
    }

    for (const [lo, hi] of this.descending) {
      const bottom = lo - MAX_CHOICE

      descending.push([Math.max(bottom, LOW), hi])
      if (bottom < LOW) ascending.push([LOW + 1, 2 * LOW - bottom])
    }

    const next = new ReachableSet(normalize(ascending), normalize(descending))

    return next.equals(this) ? this : next
  }
}

/**
 * Reachable sets from one start state, indexed by step count.
 *
 * A zero choice keeps every state in place, so the sets only grow and settle on
 * a fixed point within a few thousand steps. Sets are computed on demand and
 * stored only up to that point; every later step count reads the settled set.
 */
export class ReachableHistory {
  private readonly sets: ReachableSet[]
  private last: ReachableSet
  private settled = false

  constructor(start: OscillatorState) {
    this.last = ReachableSet.of(start)
    this.sets = [this.last]
  }

  /** States the oscillator can occupy after exactly `steps` steps. */
  at(steps: number): ReachableSet {
    while (!this.settled && this.sets.length <= steps) {
      const next = this.last.advance()

      if (next === this.last) {
        this.settled = true
      } else {
        this.sets.push(next)
        this.last = next
      }
    }

    return this.sets[steps] ?? this.last
  }

  /** Step count at which the sets stopped changing, once it has been reached. */
  get fixedAt(): number | undefined {
    return this.settled ? this.sets.length - 1 : undefined
  }
}
