import type { SelectionBatchAction } from "../app-action.js"
import type { AppEvent } from "../app-event.js"
import { selectionModeChanged } from "../app-event.js"
import type { AppState } from "../app-state.js"
import { setSelectionMode } from "../substates/selection-state.js"

/**
 * Enters or leaves selection mode. The selection substate decides whether
 * the request is an actual transition; a no-op emits nothing.
 */
export function handleSelectionMode(
  action: Extract<
    SelectionBatchAction,
    { type: "selection/enable" } | { type: "selection/cancel" }
  >,
  model: AppState,
): AppEvent[] {
  const context = action.type === "selection/enable" ? action.context : null
  const active = setSelectionMode(model.selection, context)
  return active === undefined ? [] : [selectionModeChanged(active)]
}
