import type { AppEvent } from "../app-event.js"
import { playlistChanged } from "../app-event.js"
import type { AppState } from "../app-state.js"
import { moveSongDown, moveSongUp } from "../substates/playback-state.js"
import { peekSelection } from "../substates/selection-state.js"

/**
 * Moves the first selected song one slot up or down the play queue.
 *
 * The selection is only peeked, never drained, and each dispatch takes a
 * fresh cursor: repeated dispatches keep moving the same (first) song. An
 * empty selection, a song that isn't queued, or a song already at the edge of
 * the queue produces no events.
 */
export function handleMoveSelection(
  action: { type: "selection/move-up" } | { type: "selection/move-down" },
  model: AppState,
): AppEvent[] {
  const first = peekSelection(model.selection).next()
  if (first.done) return []

  const move = action.type === "selection/move-up" ? moveSongUp : moveSongDown
  return move(model.playback, first.value.id) ? [playlistChanged()] : []
}
