import type { SongDescription, SongId } from "../models.js"
import type { SubstateUpdate } from "./updatable-state.js"

export type RepeatMode = "none" | "song" | "playlist"

export type PlaybackState = {
  /** Songs in play order. Ids are unique within the queue. */
  queue: SongDescription[]
  currentSongId: SongId | null
  isPlaying: boolean
  repeat: RepeatMode
}

export type PlaybackAction =
  | { type: "load-songs"; songs: SongDescription[] }
  | { type: "play" }
  | { type: "pause" }
  | { type: "toggle-play" }
  | { type: "play-song"; id: SongId }
  | { type: "next" }
  | { type: "previous" }
  | { type: "stop" }
  | { type: "set-repeat-mode"; mode: RepeatMode }
  | { type: "queue"; songs: SongDescription[] }
  | { type: "dequeue"; id: SongId }

export type PlaybackEvent =
  | { type: "playlist-changed" }
  | { type: "song-changed"; id: SongId }
  | { type: "playback-paused" }
  | { type: "playback-resumed" }
  | { type: "playback-stopped" }
  | { type: "repeat-mode-changed"; mode: RepeatMode }

export function createPlaybackState(): PlaybackState {
  return {
    queue: [],
    currentSongId: null,
    isPlaying: false,
    repeat: "none",
  }
}

function indexOfSong(state: PlaybackState, id: SongId): number {
  return state.queue.findIndex(song => song.id === id)
}

function currentIndex(state: PlaybackState): number {
  return state.currentSongId === null
    ? -1
    : indexOfSong(state, state.currentSongId)
}

/**
 * Appends songs to the end of the queue, skipping any already queued.
 */
export function queueSongs(state: PlaybackState, songs: SongDescription[]) {
  for (const song of songs) {
    if (indexOfSong(state, song.id) === -1) {
      state.queue.push(song)
    }
  }
}

/**
 * Removes every song whose id is in `ids`. Only the queue changes: the
 * current song and play state are left for the caller to report.
 */
export function dequeueSongs(state: PlaybackState, ids: SongId[]) {
  const removed = new Set(ids)
  state.queue = state.queue.filter(song => !removed.has(song.id))
}

function swap(state: PlaybackState, from: number, to: number) {
  const a = state.queue[from]
  const b = state.queue[to]
  if (!a || !b) return false
  state.queue[from] = b
  state.queue[to] = a
  return true
}

/**
 * Moves a song one position towards the front of the queue.
 *
 * @returns false when the song is not queued or is already first
 */
export function moveSongUp(state: PlaybackState, id: SongId): boolean {
  const index = indexOfSong(state, id)
  if (index <= 0) return false
  return swap(state, index, index - 1)
}

/**
 * Moves a song one position towards the end of the queue.
 *
 * @returns false when the song is not queued or is already last
 */
export function moveSongDown(state: PlaybackState, id: SongId): boolean {
  const index = indexOfSong(state, id)
  if (index === -1 || index === state.queue.length - 1) return false
  return swap(state, index, index + 1)
}

function playAt(state: PlaybackState, index: number): PlaybackEvent[] {
  const song = state.queue[index]
  if (!song) return []

  const events: PlaybackEvent[] = []
  if (state.currentSongId !== song.id) {
    state.currentSongId = song.id
    events.push({ type: "song-changed", id: song.id })
  }
  if (!state.isPlaying) {
    state.isPlaying = true
    events.push({ type: "playback-resumed" })
  }
  return events
}

function stop(state: PlaybackState): PlaybackEvent[] {
  if (state.currentSongId === null && !state.isPlaying) return []
  state.currentSongId = null
  state.isPlaying = false
  return [{ type: "playback-stopped" }]
}

function next(state: PlaybackState): PlaybackEvent[] {
  const index = currentIndex(state)
  if (index === -1) return []

  if (state.repeat === "song") {
    return playAt(state, index)
  }
  if (index + 1 < state.queue.length) {
    return playAt(state, index + 1)
  }
  return state.repeat === "playlist" ? playAt(state, 0) : stop(state)
}

function previous(state: PlaybackState): PlaybackEvent[] {
  const index = currentIndex(state)
  if (index === -1) return []
  return playAt(state, Math.max(0, index - 1))
}

export const updatePlaybackState: SubstateUpdate<
  PlaybackState,
  PlaybackAction,
  PlaybackEvent
> = (state, action) => {
  switch (action.type) {
    case "load-songs": {
      state.queue = []
      queueSongs(state, action.songs)
      const first = state.queue[0]
      return [
        { type: "playlist-changed" },
        ...(first ? playAt(state, 0) : stop(state)),
      ]
    }

    case "play": {
      if (state.isPlaying || state.currentSongId === null) return []
      state.isPlaying = true
      return [{ type: "playback-resumed" }]
    }

    case "pause": {
      if (!state.isPlaying) return []
      state.isPlaying = false
      return [{ type: "playback-paused" }]
    }

    case "toggle-play": {
      return updatePlaybackState(state, {
        type: state.isPlaying ? "pause" : "play",
      })
    }

    case "play-song": {
      const index = indexOfSong(state, action.id)
      return index === -1 ? [] : playAt(state, index)
    }

    case "next":
      return next(state)

    case "previous":
      return previous(state)

    case "stop":
      return stop(state)

    case "set-repeat-mode": {
      if (state.repeat === action.mode) return []
      state.repeat = action.mode
      return [{ type: "repeat-mode-changed", mode: action.mode }]
    }

    case "queue": {
      const before = state.queue.length
      queueSongs(state, action.songs)
      return state.queue.length === before ? [] : [{ type: "playlist-changed" }]
    }

    case "dequeue": {
      if (indexOfSong(state, action.id) === -1) return []
      const wasCurrent = state.currentSongId === action.id
      dequeueSongs(state, [action.id])
      return [
        { type: "playlist-changed" },
        ...(wasCurrent ? stop(state) : []),
      ]
    }
  }
}
