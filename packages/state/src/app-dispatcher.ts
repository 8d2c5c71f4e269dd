import type { Logger } from "@logtape/logtape"
import type { AppAction } from "./app-action.js"
import {
  type AppEvent,
  liftBrowserEvent,
  liftLoginEvent,
  liftPlaybackEvent,
  liftSelectionEvent,
  liftSettingsEvent,
} from "./app-event.js"
import type { AppState, AppUpdateResult } from "./app-state.js"
import { forwardAction } from "./forward-action.js"
import { handleMoveSelection } from "./handlers/handle-move-selection.js"
import {
  handleCreatePlaylist,
  handleUpdatePlaylistName,
} from "./handlers/handle-playlist.js"
import {
  handleDequeueSelection,
  handleQueueSelection,
} from "./handlers/handle-queue-selection.js"
import { handleSaveSelection } from "./handlers/handle-save-selection.js"
import { handleSelectionMode } from "./handlers/handle-selection-mode.js"
import { updateBrowserState } from "./substates/browser-state.js"
import { updateLoginState } from "./substates/login-state.js"
import { updatePlaybackState } from "./substates/playback-state.js"
import { updateSelectionState } from "./substates/selection-state.js"
import { updateSettingsState } from "./substates/settings-state.js"

const success = (events: AppEvent[]): AppUpdateResult => ({
  type: "success",
  result: events,
})

export function appDispatcher(
  action: AppAction,
  model: AppState,
  logger: Logger,
): AppUpdateResult {
  switch (action.type) {
    // Lifecycle
    case "app/start": {
      if (model.started) return success([])
      model.started = true
      return success([{ type: "app/started" }])
    }

    // Notifications only; nothing in the state tracks them
    case "app/show-notification":
      return success([{ type: "app/notification-shown", text: action.text }])

    case "app/view-now-playing":
      return success([{ type: "app/now-playing-shown" }])

    case "app/raise":
      return success([{ type: "app/raised" }])

    // Selection batches
    case "selection/queue":
      return success(handleQueueSelection(action, model))

    case "selection/dequeue":
      return success(handleDequeueSelection(action, model))

    case "selection/move-up":
    case "selection/move-down":
      return success(handleMoveSelection(action, model))

    case "selection/save":
    case "selection/unsave":
      return handleSaveSelection(action, model, logger)

    case "selection/enable":
    case "selection/cancel":
      return success(handleSelectionMode(action, model))

    // Playlist edits
    case "playlist/create":
      return success(handleCreatePlaylist(action, model))

    case "playlist/update-name":
      return success(handleUpdatePlaylistName(action, model))

    // Substate-scoped actions
    case "playback":
      return success(
        forwardAction(
          action.action,
          model.playback,
          updatePlaybackState,
          liftPlaybackEvent,
        ),
      )

    case "browser":
      return success(
        forwardAction(
          action.action,
          model.browser,
          updateBrowserState,
          liftBrowserEvent,
        ),
      )

    case "selection":
      return success(
        forwardAction(
          action.action,
          model.selection,
          updateSelectionState,
          liftSelectionEvent,
        ),
      )

    case "login":
      return success(
        forwardAction(
          action.action,
          model.login,
          updateLoginState,
          liftLoginEvent,
        ),
      )

    case "settings":
      return success(
        forwardAction(
          action.action,
          model.settings,
          updateSettingsState,
          liftSettingsEvent,
        ),
      )

    default:
      // Reachable only by actions built outside the type system
      logger.debug("unhandled action {action}", { action })
      return success([])
  }
}
