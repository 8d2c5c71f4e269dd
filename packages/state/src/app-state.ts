/**
 * App State Program - the composite state and its update function
 *
 * The application's state is one tree split five ways (playback, browser,
 * selection, login, settings) plus a handful of application-wide flags. It
 * changes only through `AppAction`s, and every change is reported as an
 * ordered list of `AppEvent`s.
 *
 * ## Update model
 *
 * Handlers are written against a mutable model: they assign, push and splice.
 * `createAppUpdate` runs them on a mutative draft and hands back a new state,
 * so the state passed in is never modified.
 *
 * ```
 * (action, state) → [state', { type: "success", result: events }]
 *                 → [state,  { type: "error", error }]   // nothing applied
 * ```
 *
 * ## Routing
 *
 * Substate-scoped actions are forwarded to the owning substate. Cross-cutting
 * actions (selection batches, playlist edits, lifecycle) are handled by the
 * composite state itself, see `app-dispatcher.ts`.
 */

import { getLogger, type Logger } from "@logtape/logtape"
import type { Patch } from "mutative"
import type { AppAction } from "./app-action.js"
import { appDispatcher } from "./app-dispatcher.js"
import type { AppEvent } from "./app-event.js"
import type { AppStateError, Result } from "./state-errors.js"
import {
  type BrowserState,
  createBrowserState,
} from "./substates/browser-state.js"
import { createLoginState, type LoginState } from "./substates/login-state.js"
import {
  createPlaybackState,
  type PlaybackState,
} from "./substates/playback-state.js"
import {
  createSelectionState,
  type SelectionState,
} from "./substates/selection-state.js"
import {
  createSettingsState,
  type SettingsState,
} from "./substates/settings-state.js"
import { makeImmutableUpdate } from "./utils/make-immutable-update.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// STATE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type AppState = {
  /** Set by the first `app/start`; never cleared */
  started: boolean
  playback: PlaybackState
  browser: BrowserState
  selection: SelectionState
  login: LoginState
  settings: SettingsState
}

export function initAppState(): AppState {
  return {
    started: false,
    playback: createPlaybackState(),
    browser: createBrowserState(),
    selection: createSelectionState(),
    login: createLoginState(),
    settings: createSettingsState(),
  }
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// UPDATE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type AppUpdateResult = Result<AppEvent[], AppStateError>

export type AppUpdate = (
  action: AppAction,
  state: AppState,
) => [AppState, AppUpdateResult]

export type HandleUpdateFn = (patches: Patch[]) => void

export type CreateAppUpdateParams = {
  logger?: Logger
  onUpdate?: HandleUpdateFn
}

function createAppLogic(appLogger: Logger) {
  const logger = appLogger.getChild("program")

  return function mutatingUpdate(
    action: AppAction,
    state: AppState,
  ): AppUpdateResult {
    logger.trace("{type}", action)
    return appDispatcher(action, state, logger)
  }
}

/**
 * Creates the application's update function.
 *
 * ```typescript
 * const update = createAppUpdate({
 *   logger: getLogger(["my-player", "state"]),
 *   onUpdate: patches => console.log("state changed:", patches),
 * })
 *
 * const [next, result] = update({ type: "app/start" }, initAppState())
 * ```
 *
 * @param logger - defaults to the `["riffline", "state"]` category
 * @param onUpdate - receives mutative patches for every committed change
 */
export function createAppUpdate({
  logger,
  onUpdate,
}: CreateAppUpdateParams = {}): AppUpdate {
  return makeImmutableUpdate(
    createAppLogic(logger ?? getLogger(["riffline", "state"])),
    {
      onPatch: onUpdate,
      shouldCommit: result => result.type === "success",
    },
  )
}
