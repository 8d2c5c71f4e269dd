import type { Patch } from "mutative"
import { describe, expect, it, vi } from "vitest"
import { makeImmutableUpdate } from "./make-immutable-update.js"

type CounterMsg = { type: "increment" } | { type: "fail" }

type CounterModel = {
  count: number
  history: string[]
}

type CounterOutput = { ok: boolean }

function counterUpdate(msg: CounterMsg, model: CounterModel): CounterOutput {
  model.count += 1
  model.history.push(msg.type)
  return { ok: msg.type === "increment" }
}

describe("makeImmutableUpdate", () => {
  it("returns a new model and leaves the input untouched", () => {
    const update = makeImmutableUpdate(counterUpdate)
    const initial: CounterModel = { count: 0, history: [] }

    const [next, output] = update({ type: "increment" }, initial)

    expect(next).toEqual({ count: 1, history: ["increment"] })
    expect(output).toEqual({ ok: true })
    expect(initial).toEqual({ count: 0, history: [] })
  })

  it("returns the input model when shouldCommit rejects the output", () => {
    const update = makeImmutableUpdate(counterUpdate, {
      shouldCommit: output => output.ok,
    })
    const initial: CounterModel = { count: 0, history: [] }

    const [next, output] = update({ type: "fail" }, initial)

    expect(next).toBe(initial)
    expect(output).toEqual({ ok: false })
  })

  it("reports patches for committed updates only", () => {
    const received: Patch[][] = []
    const update = makeImmutableUpdate(counterUpdate, {
      onPatch: patches => received.push(patches),
      shouldCommit: output => output.ok,
    })
    const initial: CounterModel = { count: 0, history: [] }

    update({ type: "fail" }, initial)
    expect(received).toHaveLength(0)

    update({ type: "increment" }, initial)
    expect(received).toHaveLength(1)
    expect(received[0]?.length).toBeGreaterThan(0)
  })

  it("does not report patches when nothing changed", () => {
    const onPatch = vi.fn()
    const update = makeImmutableUpdate(
      (_msg: CounterMsg, _model: CounterModel): CounterOutput => ({ ok: true }),
      { onPatch },
    )
    const initial: CounterModel = { count: 0, history: [] }

    const [next] = update({ type: "increment" }, initial)

    expect(next).toBe(initial)
    expect(onPatch).not.toHaveBeenCalled()
  })
})
