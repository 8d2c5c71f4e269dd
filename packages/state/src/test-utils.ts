import type { AppEvent } from "./app-event.js"
import type { AppUpdateResult } from "./app-state.js"
import type { PlaylistDescription, SongDescription } from "./models.js"

export function makeSong(id: string, title = `Song ${id}`): SongDescription {
  return {
    id,
    uri: `spotify:track:${id}`,
    title,
    artists: [{ id: `artist-${id}`, name: `Artist ${id}` }],
    album: { id: `album-${id}`, name: `Album ${id}` },
    durationMs: 180_000,
  }
}

export function makePlaylist(
  id: string,
  title = `Playlist ${id}`,
  songs: SongDescription[] = [],
): PlaylistDescription {
  return {
    id,
    title,
    owner: { id: "test-user", displayName: "Test User" },
    songs,
  }
}

/**
 * Unwraps a successful update result, failing the test otherwise.
 */
export function expectEvents(result: AppUpdateResult): AppEvent[] {
  if (result.type !== "success") {
    throw new Error(`expected success, got ${result.error.name}`)
  }
  return result.result
}
