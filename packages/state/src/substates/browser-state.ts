import {
  isSameScreen,
  type PlaylistDescription,
  type PlaylistSummary,
  type ScreenName,
  type SongDescription,
  type SongId,
} from "../models.js"
import type { SubstateUpdate } from "./updatable-state.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// STATE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * The library view: the user's saved tracks and playlists.
 */
export type HomeScreenState = {
  name: { type: "home" }
  savedTracks: SongDescription[]
  playlists: PlaylistDescription[]
}

export type PlaylistDetailsScreenState = {
  name: { type: "playlist-details"; id: string }
  playlist: PlaylistDescription | null
}

export type SearchScreenState = {
  name: { type: "search" }
  query: string
}

export type OtherScreenState = {
  name: Exclude<
    ScreenName,
    { type: "home" } | { type: "playlist-details" } | { type: "search" }
  >
}

export type ScreenState =
  | HomeScreenState
  | PlaylistDetailsScreenState
  | SearchScreenState
  | OtherScreenState

export type BrowserState = {
  /** Bottom of the stack first; the last entry is the visible screen. */
  navigationStack: ScreenState[]
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// ACTIONS & EVENTS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * Actions applied to the home screen's content, wherever home sits in the
 * navigation stack.
 */
export type HomeAction =
  | { type: "set-saved-tracks"; songs: SongDescription[] }
  | { type: "save-tracks"; songs: SongDescription[] }
  | { type: "remove-saved-tracks"; ids: SongId[] }
  | { type: "set-playlists-content"; playlists: PlaylistDescription[] }
  | { type: "prepend-playlists-content"; playlists: PlaylistDescription[] }

export type BrowserAction =
  | HomeAction
  | { type: "navigation-push"; screen: ScreenName }
  | { type: "navigation-pop" }
  | { type: "navigation-pop-to-home" }
  | { type: "navigation-reset"; screen: ScreenName }
  | { type: "set-search-query"; query: string }
  | { type: "set-playlist-details"; playlist: PlaylistDescription }
  | { type: "update-playlist-name"; summary: PlaylistSummary }

export type BrowserEvent =
  | { type: "navigation-pushed"; screen: ScreenName }
  | { type: "navigation-popped"; screen: ScreenName }
  | { type: "navigation-reset"; screen: ScreenName }
  | { type: "search-updated"; query: string }
  | { type: "playlist-details-loaded"; id: string }
  | { type: "saved-tracks-updated" }
  | { type: "saved-playlists-updated" }
  | { type: "playlist-renamed"; id: string }

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// HELPERS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

function createHomeScreenState(): HomeScreenState {
  return { name: { type: "home" }, savedTracks: [], playlists: [] }
}

function createScreenState(screen: ScreenName): ScreenState {
  switch (screen.type) {
    case "home":
      return createHomeScreenState()
    case "playlist-details":
      return { name: { type: "playlist-details", id: screen.id }, playlist: null }
    case "search":
      return { name: { type: "search" }, query: "" }
    default:
      return { name: { ...screen } }
  }
}

export function createBrowserState(): BrowserState {
  return { navigationStack: [createHomeScreenState()] }
}

function isHomeScreen(screen: ScreenState): screen is HomeScreenState {
  return screen.name.type === "home"
}

function isPlaylistDetailsScreen(
  screen: ScreenState,
): screen is PlaylistDetailsScreenState {
  return screen.name.type === "playlist-details"
}

function isSearchScreen(screen: ScreenState): screen is SearchScreenState {
  return screen.name.type === "search"
}

function isHomeAction(action: BrowserAction): action is HomeAction {
  switch (action.type) {
    case "set-saved-tracks":
    case "save-tracks":
    case "remove-saved-tracks":
    case "set-playlists-content":
    case "prepend-playlists-content":
      return true
    default:
      return false
  }
}

/**
 * Finds the home view. A browser that was reset to another root screen has
 * none, so callers must handle `undefined`.
 */
export function getHomeState(state: BrowserState): HomeScreenState | undefined {
  return state.navigationStack.find(isHomeScreen)
}

export function getVisibleScreen(state: BrowserState): ScreenName | undefined {
  const top = state.navigationStack.at(-1)
  return top ? { ...top.name } : undefined
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// UPDATE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export const updateHomeState: SubstateUpdate<
  HomeScreenState,
  HomeAction,
  BrowserEvent
> = (home, action) => {
  switch (action.type) {
    case "set-saved-tracks": {
      home.savedTracks = [...action.songs]
      return [{ type: "saved-tracks-updated" }]
    }

    case "save-tracks": {
      const saved = new Set(home.savedTracks.map(song => song.id))
      const added = action.songs.filter(song => !saved.has(song.id))
      if (added.length === 0) return []
      // Most recently saved first, like the service's own listing
      home.savedTracks = [...added, ...home.savedTracks]
      return [{ type: "saved-tracks-updated" }]
    }

    case "remove-saved-tracks": {
      const removed = new Set(action.ids)
      const remaining = home.savedTracks.filter(song => !removed.has(song.id))
      if (remaining.length === home.savedTracks.length) return []
      home.savedTracks = remaining
      return [{ type: "saved-tracks-updated" }]
    }

    case "set-playlists-content": {
      home.playlists = [...action.playlists]
      return [{ type: "saved-playlists-updated" }]
    }

    case "prepend-playlists-content": {
      home.playlists = [...action.playlists, ...home.playlists]
      return [{ type: "saved-playlists-updated" }]
    }
  }
}

function renamePlaylist(
  state: BrowserState,
  summary: PlaylistSummary,
): BrowserEvent[] {
  let renamed = false

  for (const screen of state.navigationStack) {
    if (isHomeScreen(screen)) {
      for (const playlist of screen.playlists) {
        if (playlist.id === summary.id) {
          playlist.title = summary.title
          renamed = true
        }
      }
    } else if (isPlaylistDetailsScreen(screen) && screen.playlist) {
      if (screen.playlist.id === summary.id) {
        screen.playlist.title = summary.title
        renamed = true
      }
    }
  }

  return renamed ? [{ type: "playlist-renamed", id: summary.id }] : []
}

export const updateBrowserState: SubstateUpdate<
  BrowserState,
  BrowserAction,
  BrowserEvent
> = (state, action) => {
  if (isHomeAction(action)) {
    const home = getHomeState(state)
    return home ? updateHomeState(home, action) : []
  }

  switch (action.type) {
    case "navigation-push": {
      const top = state.navigationStack.at(-1)
      if (top && isSameScreen(top.name, action.screen)) return []
      state.navigationStack.push(createScreenState(action.screen))
      return [{ type: "navigation-pushed", screen: { ...action.screen } }]
    }

    case "navigation-pop": {
      if (state.navigationStack.length <= 1) return []
      state.navigationStack.pop()
      const screen = getVisibleScreen(state)
      return screen ? [{ type: "navigation-popped", screen }] : []
    }

    case "navigation-pop-to-home": {
      const index = state.navigationStack.findIndex(isHomeScreen)
      if (index === -1 || index === state.navigationStack.length - 1) return []
      state.navigationStack.splice(index + 1)
      return [{ type: "navigation-popped", screen: { type: "home" } }]
    }

    case "navigation-reset": {
      state.navigationStack = [createScreenState(action.screen)]
      return [{ type: "navigation-reset", screen: { ...action.screen } }]
    }

    case "set-search-query": {
      const search = state.navigationStack.findLast(isSearchScreen)
      if (!search || search.query === action.query) return []
      search.query = action.query
      return [{ type: "search-updated", query: action.query }]
    }

    case "set-playlist-details": {
      const { playlist } = action
      let loaded = false
      for (const screen of state.navigationStack) {
        if (isPlaylistDetailsScreen(screen) && screen.name.id === playlist.id) {
          screen.playlist = playlist
          loaded = true
        }
      }
      return loaded ? [{ type: "playlist-details-loaded", id: playlist.id }] : []
    }

    case "update-playlist-name":
      return renamePlaylist(state, action.summary)
  }
}
