import type { AppEvent } from "../app-event.js"
import { playlistChanged, selectionModeChanged } from "../app-event.js"
import type { AppState } from "../app-state.js"
import { dequeueSongs, queueSongs } from "../substates/playback-state.js"
import { takeSelection } from "../substates/selection-state.js"

/**
 * Moves the whole selection to the end of the play queue.
 *
 * Always emits `mode-changed(false)` then `playlist-changed`, even for an
 * empty selection: draining the buffer leaves selection mode either way.
 */
export function handleQueueSelection(
  _action: { type: "selection/queue" },
  model: AppState,
): AppEvent[] {
  queueSongs(model.playback, takeSelection(model.selection))
  return [selectionModeChanged(false), playlistChanged()]
}

/**
 * Removes every selected song from the play queue. Same two events, same
 * order, as queueing.
 */
export function handleDequeueSelection(
  _action: { type: "selection/dequeue" },
  model: AppState,
): AppEvent[] {
  const ids = takeSelection(model.selection).map(song => song.id)
  dequeueSongs(model.playback, ids)
  return [selectionModeChanged(false), playlistChanged()]
}
