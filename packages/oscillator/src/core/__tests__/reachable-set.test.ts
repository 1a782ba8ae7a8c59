import { HIGH, LOW } from "../../ports/bounds"
import type { Direction, OscillatorState } from "../../ports/state"
import { ReachableHistory, ReachableSet } from "../reachable-set"
import { forwardStep } from "../step"

function key(state: OscillatorState): string {
  return `${state.position}:${state.direction}`
}

function bruteForce(start: OscillatorState, steps: number): Map<string, OscillatorState> {
  let frontier = new Map([[key(start), start]])

  for (let k = 0; k < steps; k++) {
    const next = new Map<string, OscillatorState>()

    for (const state of frontier.values()) {
      for (let choice = 0; choice <= 63; choice++) {
        const { position, direction } = forwardStep(state, choice)
        next.set(key({ position, direction }), { position, direction })
      }
    }

    frontier = next
  }

  return frontier
}

describe("ReachableSet", () => {
  it("starts as the single start state", () => {
    const set = ReachableSet.of({ position: 50_000, direction: 1 })

    expect(set.has({ position: 50_000, direction: 1 })).toBe(true)
    expect(set.has({ position: 50_000, direction: -1 })).toBe(false)
    expect(set.size).toBe(1)
  })

  it("advances away from the boundaries as one interval", () => {
    const set = ReachableSet.of({ position: 50_000, direction: 1 }).advance()

    expect(set.ascending).toEqual([[50_000, 50_063]])
    expect(set.descending).toEqual([])
  })

  it("reflects the part that crosses HIGH", () => {
    const set = ReachableSet.of({ position: 99_990, direction: 1 }).advance()

    expect(set.ascending).toEqual([[99_990, HIGH]])
    expect(set.descending).toEqual([[99_945, HIGH - 1]])
  })

  it("reflects the part that crosses LOW", () => {
    const set = ReachableSet.of({ position: 10_010, direction: -1 }).advance()

    expect(set.descending).toEqual([[LOW, 10_010]])
    expect(set.ascending).toEqual([[LOW + 1, 10_053]])
  })

  it.each<[number, Direction, number]>([
    [99_950, 1, 4],
    [10_040, -1, 4],
    [HIGH, 1, 3],
    [LOW, -1, 3],
  ])("matches exhaustive enumeration from %s heading %s for %s steps", (position, direction, steps) => {
    const start = { position, direction }
    const expected = bruteForce(start, steps)
    const set = new ReachableHistory(start).at(steps)

    expect(set.size).toBe(expected.size)
    for (const state of expected.values()) {
      expect(set.has(state)).toBe(true)
    }
  })

  it("settles on every state except LOW heading up", () => {
    const settled = new ReachableHistory({ position: 50_000, direction: 1 }).at(3_000)

    expect(settled.ascending).toEqual([[LOW + 1, HIGH]])
    expect(settled.descending).toEqual([[LOW, HIGH - 1]])
    expect(settled.advance()).toBe(settled)
  })
})

describe("ReachableHistory", () => {
  const start: OscillatorState = { position: 50_000, direction: 1 }

  it("starts from the single start state", () => {
    expect(new ReachableHistory(start).at(0).size).toBe(1)
  })

  it("only advances as far as asked", () => {
    const history = new ReachableHistory(start)

    expect(history.at(2).ascending).toEqual([[50_000, 50_126]])
    expect(history.fixedAt).toBeUndefined()
  })

  it("stops at the fixed point", () => {
    const history = new ReachableHistory(start)
    const settled = history.at(5_000)

    // the low reflected band first joins the band above 50000 after 2858 steps
    expect(history.fixedAt).toBe(2_858)
    expect(history.at(2_858)).toBe(settled)
    expect(history.at(2_857)).not.toBe(settled)
  })

  it("answers huge step counts from the settled set", () => {
    const history = new ReachableHistory(start)
    const begun = performance.now()

    const far = history.at(2 ** 40)

    expect(performance.now() - begun).toBeLessThan(2_000)
    expect(far).toBe(history.at(3_000))
    expect(far.size).toBe(2 * (HIGH - LOW))
  })
})
