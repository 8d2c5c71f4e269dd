import { describe, expect, it } from "vitest"
import { makePlaylist, makeSong } from "../test-utils.js"
import {
  type BrowserState,
  createBrowserState,
  getHomeState,
  getVisibleScreen,
  type HomeScreenState,
  updateBrowserState,
  updateHomeState,
} from "./browser-state.js"

function home(state: BrowserState): HomeScreenState {
  const found = getHomeState(state)
  if (!found) throw new Error("expected a home view")
  return found
}

describe("navigation", () => {
  it("starts on the home screen", () => {
    const state = createBrowserState()

    expect(getVisibleScreen(state)).toEqual({ type: "home" })
    expect(getHomeState(state)).toBeDefined()
  })

  it("pushes a screen once even if asked twice", () => {
    const state = createBrowserState()
    const push = {
      type: "navigation-push",
      screen: { type: "album-details", id: "1" },
    } as const

    expect(updateBrowserState(state, push)).toEqual([
      { type: "navigation-pushed", screen: { type: "album-details", id: "1" } },
    ])
    expect(updateBrowserState(state, push)).toEqual([])
    expect(state.navigationStack).toHaveLength(2)
  })

  it("pops back to the previous screen but never past the root", () => {
    const state = createBrowserState()
    updateBrowserState(state, {
      type: "navigation-push",
      screen: { type: "artist", id: "x" },
    })

    expect(updateBrowserState(state, { type: "navigation-pop" })).toEqual([
      { type: "navigation-popped", screen: { type: "home" } },
    ])
    expect(updateBrowserState(state, { type: "navigation-pop" })).toEqual([])
  })

  it("pops straight back to home", () => {
    const state = createBrowserState()
    updateBrowserState(state, {
      type: "navigation-push",
      screen: { type: "artist", id: "x" },
    })
    updateBrowserState(state, {
      type: "navigation-push",
      screen: { type: "user", id: "u" },
    })

    expect(
      updateBrowserState(state, { type: "navigation-pop-to-home" }),
    ).toEqual([{ type: "navigation-popped", screen: { type: "home" } }])
    expect(state.navigationStack).toHaveLength(1)
    expect(
      updateBrowserState(state, { type: "navigation-pop-to-home" }),
    ).toEqual([])
  })

  it("reset can leave the browser without a home view", () => {
    const state = createBrowserState()

    expect(
      updateBrowserState(state, {
        type: "navigation-reset",
        screen: { type: "search" },
      }),
    ).toEqual([{ type: "navigation-reset", screen: { type: "search" } }])
    expect(getHomeState(state)).toBeUndefined()
  })

  it("updates the query of the search screen", () => {
    const state = createBrowserState()
    updateBrowserState(state, {
      type: "navigation-push",
      screen: { type: "search" },
    })

    expect(
      updateBrowserState(state, { type: "set-search-query", query: "jazz" }),
    ).toEqual([{ type: "search-updated", query: "jazz" }])
    expect(
      updateBrowserState(state, { type: "set-search-query", query: "jazz" }),
    ).toEqual([])
  })

  it("ignores a search query when no search screen is open", () => {
    const state = createBrowserState()
    expect(
      updateBrowserState(state, { type: "set-search-query", query: "jazz" }),
    ).toEqual([])
  })
})

describe("home view", () => {
  it("saves new tracks newest first and skips already saved ones", () => {
    const state = createBrowserState()
    updateHomeState(home(state), {
      type: "set-saved-tracks",
      songs: [makeSong("a")],
    })

    expect(
      updateHomeState(home(state), {
        type: "save-tracks",
        songs: [makeSong("b"), makeSong("a")],
      }),
    ).toEqual([{ type: "saved-tracks-updated" }])
    expect(home(state).savedTracks.map(song => song.id)).toEqual(["b", "a"])
    expect(
      updateHomeState(home(state), {
        type: "save-tracks",
        songs: [makeSong("a")],
      }),
    ).toEqual([])
  })

  it("removes saved tracks by id", () => {
    const state = createBrowserState()
    updateHomeState(home(state), {
      type: "set-saved-tracks",
      songs: [makeSong("a"), makeSong("b")],
    })

    expect(
      updateHomeState(home(state), { type: "remove-saved-tracks", ids: ["a"] }),
    ).toEqual([{ type: "saved-tracks-updated" }])
    expect(home(state).savedTracks.map(song => song.id)).toEqual(["b"])
    expect(
      updateHomeState(home(state), {
        type: "remove-saved-tracks",
        ids: ["missing"],
      }),
    ).toEqual([])
  })

  it("prepends playlists to the listing", () => {
    const state = createBrowserState()
    updateBrowserState(state, {
      type: "set-playlists-content",
      playlists: [makePlaylist("old")],
    })

    expect(
      updateBrowserState(state, {
        type: "prepend-playlists-content",
        playlists: [makePlaylist("new")],
      }),
    ).toEqual([{ type: "saved-playlists-updated" }])
    expect(home(state).playlists.map(p => p.id)).toEqual(["new", "old"])
  })

  it("drops home actions when there is no home view", () => {
    const state = createBrowserState()
    updateBrowserState(state, {
      type: "navigation-reset",
      screen: { type: "search" },
    })

    expect(
      updateBrowserState(state, {
        type: "save-tracks",
        songs: [makeSong("a")],
      }),
    ).toEqual([])
  })
})

describe("playlists", () => {
  it("loads details into the matching open screen", () => {
    const state = createBrowserState()
    updateBrowserState(state, {
      type: "navigation-push",
      screen: { type: "playlist-details", id: "p1" },
    })

    expect(
      updateBrowserState(state, {
        type: "set-playlist-details",
        playlist: makePlaylist("p1"),
      }),
    ).toEqual([{ type: "playlist-details-loaded", id: "p1" }])
    expect(
      updateBrowserState(state, {
        type: "set-playlist-details",
        playlist: makePlaylist("p2"),
      }),
    ).toEqual([])
  })

  it("renames a playlist in the listing and in its details screen", () => {
    const state = createBrowserState()
    updateBrowserState(state, {
      type: "set-playlists-content",
      playlists: [makePlaylist("p1", "Old")],
    })
    updateBrowserState(state, {
      type: "navigation-push",
      screen: { type: "playlist-details", id: "p1" },
    })
    updateBrowserState(state, {
      type: "set-playlist-details",
      playlist: makePlaylist("p1", "Old"),
    })

    expect(
      updateBrowserState(state, {
        type: "update-playlist-name",
        summary: { id: "p1", title: "New" },
      }),
    ).toEqual([{ type: "playlist-renamed", id: "p1" }])

    expect(home(state).playlists[0]?.title).toBe("New")
    const details = state.navigationStack[1]
    expect(details && "playlist" in details ? details.playlist?.title : null).toBe(
      "New",
    )
  })

  it("reports nothing when renaming an unknown playlist", () => {
    const state = createBrowserState()
    expect(
      updateBrowserState(state, {
        type: "update-playlist-name",
        summary: { id: "missing", title: "New" },
      }),
    ).toEqual([])
  })
})
