import type { AppAction } from "./app-action.js"

export type Result<T, E extends Error = Error> =
  | {
      type: "success"
      result: T
    }
  | {
      type: "error"
      error: E
    }

/**
 * Base class for failures the composite state reports instead of applying an
 * action.
 */
export class AppStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "AppStateError"
  }
}

/**
 * Returned as the error of an update result when an action needs the browser's home view (saving
 * or unsaving the selection) but the navigation stack has none.
 */
export class HomeViewUnavailableError extends AppStateError {
  constructor(public readonly actionType: AppAction["type"]) {
    super(
      `'${actionType}' needs the browser home view, but it is not in the navigation stack. ` +
        `Navigate to home before dispatching it.`,
    )
    this.name = "HomeViewUnavailableError"
  }
}

/**
 * Thrown when `AppStore.dispatch` is called from inside a subscriber. Use the
 * `dispatch` handed to the subscriber instead; it runs after the current
 * dispatch completes.
 */
export class ReentrantDispatchError extends AppStateError {
  constructor(public readonly actionType: AppAction["type"]) {
    super(
      `dispatch('${actionType}') was called while subscribers were being notified. ` +
        `Use the dispatch function passed to the subscriber instead.`,
    )
    this.name = "ReentrantDispatchError"
  }
}
