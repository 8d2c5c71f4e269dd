import type { PlaylistSummary } from "../models.js"
import type { SubstateUpdate } from "./updatable-state.js"

export type LoggedUser = {
  username: string
}

export type LoginState = {
  user: LoggedUser | null
  /** The user's own playlists, newest first */
  playlists: PlaylistSummary[]
}

export type LoginAction =
  | { type: "set-login-success"; username: string }
  | { type: "logout" }
  | { type: "set-user-playlists"; playlists: PlaylistSummary[] }
  | { type: "prepend-user-playlist"; playlists: PlaylistSummary[] }
  | { type: "update-user-playlist"; summary: PlaylistSummary }

export type LoginEvent =
  | { type: "login-completed"; username: string }
  | { type: "logout-completed" }
  | { type: "user-playlists-loaded" }

export function createLoginState(): LoginState {
  return { user: null, playlists: [] }
}

export const updateLoginState: SubstateUpdate<
  LoginState,
  LoginAction,
  LoginEvent
> = (state, action) => {
  switch (action.type) {
    case "set-login-success": {
      state.user = { username: action.username }
      return [{ type: "login-completed", username: action.username }]
    }

    case "logout": {
      if (state.user === null) return []
      state.user = null
      state.playlists = []
      return [{ type: "logout-completed" }]
    }

    case "set-user-playlists": {
      state.playlists = action.playlists.map(p => ({ ...p }))
      return [{ type: "user-playlists-loaded" }]
    }

    case "prepend-user-playlist": {
      state.playlists = [
        ...action.playlists.map(p => ({ ...p })),
        ...state.playlists,
      ]
      return [{ type: "user-playlists-loaded" }]
    }

    case "update-user-playlist": {
      const playlist = state.playlists.find(p => p.id === action.summary.id)
      if (!playlist) return []
      playlist.title = action.summary.title
      return [{ type: "user-playlists-loaded" }]
    }
  }
}
