export type SongId = string
export type PlaylistId = string

export type ArtistRef = {
  id: string
  name: string
}

export type AlbumRef = {
  id: string
  name: string
}

export type UserRef = {
  id: string
  displayName: string
}

export type SongDescription = {
  id: SongId
  uri: string
  title: string
  artists: ArtistRef[]
  album: AlbumRef
  durationMs: number
}

export type PlaylistDescription = {
  id: PlaylistId
  title: string
  owner: UserRef
  songs: SongDescription[]
}

/**
 * The part of a playlist the user's sidebar and library listings need.
 */
export type PlaylistSummary = {
  id: PlaylistId
  title: string
}

export function toPlaylistSummary(playlist: PlaylistDescription): PlaylistSummary {
  return { id: playlist.id, title: playlist.title }
}

/**
 * Every screen the browser can navigate to.
 */
export type ScreenName =
  | { type: "home" }
  | { type: "album-details"; id: string }
  | { type: "artist"; id: string }
  | { type: "playlist-details"; id: PlaylistId }
  | { type: "user"; id: string }
  | { type: "search" }

export function isSameScreen(a: ScreenName, b: ScreenName): boolean {
  if (a.type !== b.type) return false
  if ("id" in a && "id" in b) return a.id === b.id
  return true
}

/**
 * What kind of list the user is multi-selecting from. It decides which batch
 * operations are offered while selection mode is active.
 */
export type SelectionContext =
  | { type: "default" }
  | { type: "queue" }
  | { type: "read-only-queue" }
  | { type: "playlist" }
  | { type: "editable-playlist"; playlistId: PlaylistId }
  | { type: "saved-tracks" }

export function isSameSelectionContext(
  a: SelectionContext,
  b: SelectionContext,
): boolean {
  if (a.type === "editable-playlist" && b.type === "editable-playlist") {
    return a.playlistId === b.playlistId
  }
  return a.type === b.type
}
