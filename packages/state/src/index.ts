// Actions
export type {
  AppAction,
  CrossCuttingAction,
  LifecycleAction,
  PlaylistAction,
  SelectionBatchAction,
  SubstateAction,
} from "./app-action.js"
export {
  browserAction,
  loginAction,
  playbackAction,
  selectionAction,
  settingsAction,
  viewAlbum,
  viewArtist,
  viewPlaylist,
  viewSearch,
  viewUser,
} from "./app-action.js"
export { openUri, URI_SCHEME } from "./open-uri.js"

// Events
export type { AppEvent, AppLevelEvent, SubstateEvent } from "./app-event.js"
export {
  liftBrowserEvent,
  liftLoginEvent,
  liftPlaybackEvent,
  liftSelectionEvent,
  liftSettingsEvent,
} from "./app-event.js"

// Composite state and update
export type {
  AppState,
  AppUpdate,
  AppUpdateResult,
  CreateAppUpdateParams,
  HandleUpdateFn,
} from "./app-state.js"
export { createAppUpdate, initAppState } from "./app-state.js"
export { forwardAction } from "./forward-action.js"
export type { AppStoreSubscriber, Dispatch } from "./app-store.js"
export { AppStore } from "./app-store.js"

// Errors
export type { Result } from "./state-errors.js"
export {
  AppStateError,
  HomeViewUnavailableError,
  ReentrantDispatchError,
} from "./state-errors.js"

// Models
export type {
  AlbumRef,
  ArtistRef,
  PlaylistDescription,
  PlaylistId,
  PlaylistSummary,
  ScreenName,
  SelectionContext,
  SongDescription,
  SongId,
  UserRef,
} from "./models.js"
export {
  isSameScreen,
  isSameSelectionContext,
  toPlaylistSummary,
} from "./models.js"

// Substates
export type { SubstateUpdate } from "./substates/updatable-state.js"
export * from "./substates/browser-state.js"
export * from "./substates/login-state.js"
export * from "./substates/playback-state.js"
export * from "./substates/selection-state.js"
export * from "./substates/settings-state.js"
