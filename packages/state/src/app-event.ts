import type { BrowserEvent } from "./substates/browser-state.js"
import type { LoginEvent } from "./substates/login-state.js"
import type { PlaybackEvent } from "./substates/playback-state.js"
import type { SelectionEvent } from "./substates/selection-state.js"
import type { SettingsEvent } from "./substates/settings-state.js"

/**
 * A change reported by one substate, lifted into the application's event
 * stream.
 */
export type SubstateEvent =
  | { type: "playback"; event: PlaybackEvent }
  | { type: "browser"; event: BrowserEvent }
  | { type: "selection"; event: SelectionEvent }
  | { type: "login"; event: LoginEvent }
  | { type: "settings"; event: SettingsEvent }

export type AppLevelEvent =
  | { type: "app/started" }
  | { type: "app/raised" }
  | { type: "app/notification-shown"; text: string }
  | { type: "app/playlist-created-notification-shown"; id: string }
  | { type: "app/now-playing-shown" }

/**
 * What just changed. Events are the only signal that state changed; a
 * dispatch that returns none changed nothing.
 */
export type AppEvent = SubstateEvent | AppLevelEvent

export const liftPlaybackEvent = (event: PlaybackEvent): AppEvent => ({
  type: "playback",
  event,
})

export const liftBrowserEvent = (event: BrowserEvent): AppEvent => ({
  type: "browser",
  event,
})

export const liftSelectionEvent = (event: SelectionEvent): AppEvent => ({
  type: "selection",
  event,
})

export const liftLoginEvent = (event: LoginEvent): AppEvent => ({
  type: "login",
  event,
})

export const liftSettingsEvent = (event: SettingsEvent): AppEvent => ({
  type: "settings",
  event,
})

export const selectionModeChanged = (active: boolean): AppEvent =>
  liftSelectionEvent({ type: "mode-changed", active })

export const playlistChanged = (): AppEvent =>
  liftPlaybackEvent({ type: "playlist-changed" })
