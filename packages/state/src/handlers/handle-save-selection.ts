import type { Logger } from "@logtape/logtape"
import { liftBrowserEvent, selectionModeChanged } from "../app-event.js"
import type { AppState, AppUpdateResult } from "../app-state.js"
import { forwardAction } from "../forward-action.js"
import { HomeViewUnavailableError } from "../state-errors.js"
import {
  getHomeState,
  type HomeAction,
  updateHomeState,
} from "../substates/browser-state.js"
import { takeSelection } from "../substates/selection-state.js"

/**
 * Saves (or unsaves) the selected songs in the library's home view, then
 * leaves selection mode.
 *
 * Events: whatever the home view reported, followed by `mode-changed(false)`.
 *
 * The home view is looked up before the selection is drained. Without one
 * the action fails with `HomeViewUnavailableError` and nothing changes.
 */
export function handleSaveSelection(
  action: { type: "selection/save" } | { type: "selection/unsave" },
  model: AppState,
  logger: Logger,
): AppUpdateResult {
  const home = getHomeState(model.browser)
  if (!home) {
    logger.warn("{type}: no home view in the navigation stack", {
      type: action.type,
    })
    return { type: "error", error: new HomeViewUnavailableError(action.type) }
  }

  const songs = takeSelection(model.selection)
  const homeAction: HomeAction =
    action.type === "selection/save"
      ? { type: "save-tracks", songs }
      : { type: "remove-saved-tracks", ids: songs.map(song => song.id) }

  const events = forwardAction(
    homeAction,
    home,
    updateHomeState,
    liftBrowserEvent,
  )
  events.push(selectionModeChanged(false))

  return { type: "success", result: events }
}
