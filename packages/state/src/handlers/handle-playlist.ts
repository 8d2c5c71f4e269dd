import type { AppEvent } from "../app-event.js"
import { liftBrowserEvent, liftLoginEvent } from "../app-event.js"
import type { AppState } from "../app-state.js"
import { forwardAction } from "../forward-action.js"
import {
  type PlaylistDescription,
  type PlaylistSummary,
  toPlaylistSummary,
} from "../models.js"
import {
  type BrowserAction,
  updateBrowserState,
} from "../substates/browser-state.js"
import { type LoginAction, updateLoginState } from "../substates/login-state.js"

/**
 * A playlist the user just created goes on top of their session's playlist
 * list and on top of the browser's playlist listing.
 *
 * Events, in order: the session's, the browser's, then one
 * `playlist-created-notification-shown` with the new playlist's id.
 */
export function handleCreatePlaylist(
  action: { type: "playlist/create"; playlist: PlaylistDescription },
  model: AppState,
): AppEvent[] {
  const { playlist } = action
  const toSession: LoginAction = {
    type: "prepend-user-playlist",
    playlists: [toPlaylistSummary(playlist)],
  }
  const toBrowser: BrowserAction = {
    type: "prepend-playlists-content",
    playlists: [playlist],
  }

  return [
    ...forwardAction(toSession, model.login, updateLoginState, liftLoginEvent),
    ...forwardAction(
      toBrowser,
      model.browser,
      updateBrowserState,
      liftBrowserEvent,
    ),
    { type: "app/playlist-created-notification-shown", id: playlist.id },
  ]
}

/**
 * Renames a playlist in the session, then in the browser. Events are the
 * session's followed by the browser's; nothing is appended.
 */
export function handleUpdatePlaylistName(
  action: { type: "playlist/update-name"; summary: PlaylistSummary },
  model: AppState,
): AppEvent[] {
  const summary = { ...action.summary }
  const toSession: LoginAction = { type: "update-user-playlist", summary }
  const toBrowser: BrowserAction = { type: "update-playlist-name", summary }

  return [
    ...forwardAction(toSession, model.login, updateLoginState, liftLoginEvent),
    ...forwardAction(
      toBrowser,
      model.browser,
      updateBrowserState,
      liftBrowserEvent,
    ),
  ]
}
