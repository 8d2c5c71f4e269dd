import {
  isSameSelectionContext,
  type SelectionContext,
  type SongDescription,
  type SongId,
} from "../models.js"
import { snapshot } from "../utils/snapshot.js"
import type { SubstateUpdate } from "./updatable-state.js"

export type SelectionState = {
  /** `null` while selection mode is off */
  context: SelectionContext | null
  /** Selected songs, in the order they were picked */
  selected: SongDescription[]
}

export type SelectionAction =
  | { type: "select"; songs: SongDescription[] }
  | { type: "deselect"; ids: SongId[] }
  | { type: "clear" }

export type SelectionEvent =
  | { type: "mode-changed"; active: boolean }
  | { type: "selection-changed" }

export function createSelectionState(): SelectionState {
  return { context: null, selected: [] }
}

export function isSelectionActive(state: SelectionState): boolean {
  return state.context !== null
}

/**
 * Empties the selection buffer, leaves selection mode and returns what was
 * selected.
 */
export function takeSelection(state: SelectionState): SongDescription[] {
  const taken = snapshot(state.selected)
  state.selected = []
  state.context = null
  return taken
}

/**
 * A fresh cursor over the selected songs. Reading it does not change the
 * selection.
 */
export function peekSelection(
  state: SelectionState,
): IterableIterator<SongDescription> {
  return state.selected.values()
}

/**
 * Enters, switches or leaves selection mode.
 *
 * - inactive, enable: activates
 * - active, enable a different context: switches and drops the buffer
 * - active, enable the same context: no-op
 * - active, cancel: deactivates and drops the buffer
 * - inactive, cancel: no-op
 *
 * @returns the new active flag when the mode changed, `undefined` otherwise
 */
export function setSelectionMode(
  state: SelectionState,
  context: SelectionContext | null,
): boolean | undefined {
  const previous = state.context

  if (context === null) {
    if (previous === null) return undefined
    state.context = null
    state.selected = []
    return false
  }

  if (previous !== null && isSameSelectionContext(previous, context)) {
    return undefined
  }

  state.context = { ...context }
  state.selected = []
  return true
}

export const updateSelectionState: SubstateUpdate<
  SelectionState,
  SelectionAction,
  SelectionEvent
> = (state, action) => {
  switch (action.type) {
    case "select": {
      if (!isSelectionActive(state)) return []
      const selected = new Set(state.selected.map(song => song.id))
      let changed = false
      for (const song of action.songs) {
        if (selected.has(song.id)) continue
        selected.add(song.id)
        state.selected.push(song)
        changed = true
      }
      return changed ? [{ type: "selection-changed" }] : []
    }

    case "deselect": {
      const removed = new Set(action.ids)
      const remaining = state.selected.filter(song => !removed.has(song.id))
      if (remaining.length === state.selected.length) return []
      state.selected = remaining
      return [{ type: "selection-changed" }]
    }

    case "clear": {
      if (state.selected.length === 0) return []
      state.selected = []
      return [{ type: "selection-changed" }]
    }
  }
}
