import type { SubstateUpdate } from "./updatable-state.js"

export type Theme = "system" | "light" | "dark"

export type SettingsState = {
  theme: Theme
  gaplessPlayback: boolean
  /** How many playlist entries the browser asks for per page */
  playlistPageSize: number
}

export type SettingsAction =
  | { type: "set-theme"; theme: Theme }
  | { type: "set-gapless-playback"; enabled: boolean }
  | { type: "set-playlist-page-size"; size: number }
  | { type: "reset" }

export type SettingsEvent =
  | { type: "theme-changed"; theme: Theme }
  | { type: "settings-changed" }

export const DEFAULT_SETTINGS: Readonly<SettingsState> = {
  theme: "system",
  gaplessPlayback: true,
  playlistPageSize: 50,
}

export function createSettingsState(): SettingsState {
  return { ...DEFAULT_SETTINGS }
}

export const updateSettingsState: SubstateUpdate<
  SettingsState,
  SettingsAction,
  SettingsEvent
> = (state, action) => {
  switch (action.type) {
    case "set-theme": {
      if (state.theme === action.theme) return []
      state.theme = action.theme
      return [{ type: "theme-changed", theme: action.theme }]
    }

    case "set-gapless-playback": {
      if (state.gaplessPlayback === action.enabled) return []
      state.gaplessPlayback = action.enabled
      return [{ type: "settings-changed" }]
    }

    case "set-playlist-page-size": {
      if (!Number.isInteger(action.size) || action.size <= 0) return []
      if (state.playlistPageSize === action.size) return []
      state.playlistPageSize = action.size
      return [{ type: "settings-changed" }]
    }

    case "reset": {
      const themeChanged = state.theme !== DEFAULT_SETTINGS.theme
      const otherChanged =
        state.gaplessPlayback !== DEFAULT_SETTINGS.gaplessPlayback ||
        state.playlistPageSize !== DEFAULT_SETTINGS.playlistPageSize
      Object.assign(state, DEFAULT_SETTINGS)

      const events: SettingsEvent[] = []
      if (themeChanged) {
        events.push({ type: "theme-changed", theme: DEFAULT_SETTINGS.theme })
      }
      if (otherChanged) {
        events.push({ type: "settings-changed" })
      }
      return events
    }
  }
}
