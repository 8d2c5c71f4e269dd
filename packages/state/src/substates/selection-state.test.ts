import { describe, expect, it } from "vitest"
import type { SongDescription } from "../models.js"
import { makeSong } from "../test-utils.js"
import {
  createSelectionState,
  isSelectionActive,
  peekSelection,
  type SelectionState,
  setSelectionMode,
  takeSelection,
  updateSelectionState,
} from "./selection-state.js"

const A = makeSong("a")
const B = makeSong("b")

function activeWith(...songs: SongDescription[]): SelectionState {
  const state = createSelectionState()
  setSelectionMode(state, { type: "default" })
  updateSelectionState(state, { type: "select", songs })
  return state
}

describe("setSelectionMode", () => {
  it("activates from inactive", () => {
    const state = createSelectionState()

    expect(setSelectionMode(state, { type: "queue" })).toBe(true)
    expect(state.context).toEqual({ type: "queue" })
  })

  it("is a no-op for the context already active", () => {
    const state = createSelectionState()
    setSelectionMode(state, { type: "editable-playlist", playlistId: "p1" })

    expect(
      setSelectionMode(state, { type: "editable-playlist", playlistId: "p1" }),
    ).toBeUndefined()
  })

  it("switches to a different context and drops the buffer", () => {
    const state = activeWith(A)

    expect(setSelectionMode(state, { type: "saved-tracks" })).toBe(true)
    expect(state.context).toEqual({ type: "saved-tracks" })
    expect(state.selected).toEqual([])
  })

  it("treats editable playlists with different ids as different contexts", () => {
    const state = createSelectionState()
    setSelectionMode(state, { type: "editable-playlist", playlistId: "p1" })

    expect(
      setSelectionMode(state, { type: "editable-playlist", playlistId: "p2" }),
    ).toBe(true)
  })

  it("cancels an active mode and is a no-op when inactive", () => {
    const state = activeWith(A)

    expect(setSelectionMode(state, null)).toBe(false)
    expect(isSelectionActive(state)).toBe(false)
    expect(state.selected).toEqual([])
    expect(setSelectionMode(state, null)).toBeUndefined()
  })
})

describe("takeSelection", () => {
  it("returns the selection in order, empties it and leaves selection mode", () => {
    const state = activeWith(A, B)

    expect(takeSelection(state).map(song => song.id)).toEqual(["a", "b"])
    expect(state.selected).toEqual([])
    expect(state.context).toBeNull()
  })
})

describe("peekSelection", () => {
  it("hands out a fresh cursor each time without draining", () => {
    const state = activeWith(A, B)

    const first = peekSelection(state)
    expect(first.next().value?.id).toBe("a")
    expect(first.next().value?.id).toBe("b")
    expect(first.next().done).toBe(true)

    expect(peekSelection(state).next().value?.id).toBe("a")
    expect(state.selected).toHaveLength(2)
  })
})

describe("updateSelectionState", () => {
  it("ignores select while selection mode is off", () => {
    const state = createSelectionState()

    expect(updateSelectionState(state, { type: "select", songs: [A] })).toEqual(
      [],
    )
    expect(state.selected).toEqual([])
  })

  it("selects each song once", () => {
    const state = activeWith()

    expect(
      updateSelectionState(state, { type: "select", songs: [A, B, A] }),
    ).toEqual([{ type: "selection-changed" }])
    expect(state.selected.map(song => song.id)).toEqual(["a", "b"])
    expect(updateSelectionState(state, { type: "select", songs: [B] })).toEqual(
      [],
    )
  })

  it("deselects by id", () => {
    const state = activeWith(A, B)

    expect(updateSelectionState(state, { type: "deselect", ids: ["a"] })).toEqual(
      [{ type: "selection-changed" }],
    )
    expect(state.selected.map(song => song.id)).toEqual(["b"])
    expect(
      updateSelectionState(state, { type: "deselect", ids: ["missing"] }),
    ).toEqual([])
  })

  it("clears the buffer but stays in selection mode", () => {
    const state = activeWith(A)

    expect(updateSelectionState(state, { type: "clear" })).toEqual([
      { type: "selection-changed" },
    ])
    expect(isSelectionActive(state)).toBe(true)
    expect(updateSelectionState(state, { type: "clear" })).toEqual([])
  })
})
