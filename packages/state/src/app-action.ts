import type {
  PlaylistDescription,
  PlaylistSummary,
  ScreenName,
  SelectionContext,
} from "./models.js"
import type { BrowserAction } from "./substates/browser-state.js"
import type { LoginAction } from "./substates/login-state.js"
import type { PlaybackAction } from "./substates/playback-state.js"
import type { SelectionAction } from "./substates/selection-state.js"
import type { SettingsAction } from "./substates/settings-state.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// SUBSTATE-SCOPED ACTIONS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * An action owned by exactly one substate. The composite state forwards the
 * inner action untouched.
 */
export type SubstateAction =
  | { type: "playback"; action: PlaybackAction }
  | { type: "browser"; action: BrowserAction }
  | { type: "selection"; action: SelectionAction }
  | { type: "login"; action: LoginAction }
  | { type: "settings"; action: SettingsAction }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// CROSS-CUTTING ACTIONS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/** Application lifecycle and notifications; no substate is touched */
export type LifecycleAction =
  | { type: "app/start" }
  | { type: "app/raise" }
  | { type: "app/show-notification"; text: string }
  | { type: "app/view-now-playing" }

/** Batch operations on the multi-selection (selection + playback or browser) */
export type SelectionBatchAction =
  | { type: "selection/queue" }
  | { type: "selection/dequeue" }
  | { type: "selection/move-up" }
  | { type: "selection/move-down" }
  | { type: "selection/save" }
  | { type: "selection/unsave" }
  | { type: "selection/enable"; context: SelectionContext }
  | { type: "selection/cancel" }

/** Playlist edits mirrored into the session and the browser */
export type PlaylistAction =
  | { type: "playlist/create"; playlist: PlaylistDescription }
  | { type: "playlist/update-name"; summary: PlaylistSummary }

export type CrossCuttingAction =
  | LifecycleAction
  | SelectionBatchAction
  | PlaylistAction

/**
 * Everything a caller can ask the application state to do.
 *
 * Actions are plain, JSON-serializable data: ids, descriptions and contexts,
 * never references into live state.
 */
export type AppAction = SubstateAction | CrossCuttingAction

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// CONSTRUCTORS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export function playbackAction(action: PlaybackAction): AppAction {
  return { type: "playback", action }
}

export function browserAction(action: BrowserAction): AppAction {
  return { type: "browser", action }
}

export function selectionAction(action: SelectionAction): AppAction {
  return { type: "selection", action }
}

export function loginAction(action: LoginAction): AppAction {
  return { type: "login", action }
}

export function settingsAction(action: SettingsAction): AppAction {
  return { type: "settings", action }
}

function navigateTo(screen: ScreenName): AppAction {
  return browserAction({ type: "navigation-push", screen })
}

export function viewAlbum(id: string): AppAction {
  return navigateTo({ type: "album-details", id })
}

export function viewArtist(id: string): AppAction {
  return navigateTo({ type: "artist", id })
}

export function viewPlaylist(id: string): AppAction {
  return navigateTo({ type: "playlist-details", id })
}

export function viewUser(id: string): AppAction {
  return navigateTo({ type: "user", id })
}

export function viewSearch(): AppAction {
  return navigateTo({ type: "search" })
}
