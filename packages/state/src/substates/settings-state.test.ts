import { describe, expect, it } from "vitest"
import {
  createSettingsState,
  DEFAULT_SETTINGS,
  updateSettingsState,
} from "./settings-state.js"

describe("updateSettingsState", () => {
  it("reports theme changes with the new theme", () => {
    const state = createSettingsState()

    expect(updateSettingsState(state, { type: "set-theme", theme: "dark" })).toEqual(
      [{ type: "theme-changed", theme: "dark" }],
    )
    expect(updateSettingsState(state, { type: "set-theme", theme: "dark" })).toEqual(
      [],
    )
  })

  it("toggles gapless playback", () => {
    const state = createSettingsState()

    expect(
      updateSettingsState(state, { type: "set-gapless-playback", enabled: false }),
    ).toEqual([{ type: "settings-changed" }])
    expect(state.gaplessPlayback).toBe(false)
  })

  it("accepts only positive whole page sizes", () => {
    const state = createSettingsState()

    expect(
      updateSettingsState(state, { type: "set-playlist-page-size", size: 0 }),
    ).toEqual([])
    expect(
      updateSettingsState(state, { type: "set-playlist-page-size", size: 2.5 }),
    ).toEqual([])
    expect(
      updateSettingsState(state, { type: "set-playlist-page-size", size: 100 }),
    ).toEqual([{ type: "settings-changed" }])
    expect(state.playlistPageSize).toBe(100)
  })

  it("resets to defaults and reports what changed", () => {
    const state = createSettingsState()
    updateSettingsState(state, { type: "set-theme", theme: "light" })
    updateSettingsState(state, { type: "set-playlist-page-size", size: 10 })

    expect(updateSettingsState(state, { type: "reset" })).toEqual([
      { type: "theme-changed", theme: "system" },
      { type: "settings-changed" },
    ])
    expect(state).toEqual(DEFAULT_SETTINGS)
    expect(updateSettingsState(state, { type: "reset" })).toEqual([])
  })
})
