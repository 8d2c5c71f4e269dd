import { getLogger, type Logger } from "@logtape/logtape"
import type { AppAction } from "./app-action.js"
import type { AppEvent } from "./app-event.js"
import {
  type AppState,
  type AppUpdate,
  type AppUpdateResult,
  createAppUpdate,
  type HandleUpdateFn,
  initAppState,
} from "./app-state.js"
import { openUri } from "./open-uri.js"
import { ReentrantDispatchError } from "./state-errors.js"
import { deepFreeze } from "./utils/deep-freeze.js"
import { WorkQueue } from "./utils/work-queue.js"

/**
 * Sends an action to the store. Inside a subscriber the action is applied
 * after the current dispatch finishes.
 */
export type Dispatch = (action: AppAction) => void

/**
 * Called after every dispatch that produced events, with the events in
 * emission order.
 */
export type AppStoreSubscriber = (
  events: AppEvent[],
  dispatch: Dispatch,
) => void

type AppStoreParams = {
  initialState?: AppState
  logger?: Logger
  onUpdate?: HandleUpdateFn
}

/**
 * Owns the application state and is the only way to change it.
 *
 * Every dispatch runs synchronously to completion: the action is applied,
 * the new state is committed, and subscribers are told what changed before
 * `dispatch` returns. Actions that subscribers dispatch in response are
 * queued and applied in order once the current dispatch is done.
 *
 * The state it hands out is deeply frozen, and so is anything an action
 * carried into it: the reducer is the only way to change it.
 *
 * @example
 * ```typescript
 * const store = new AppStore()
 *
 * store.subscribe(events => {
 *   for (const event of events) render(event)
 * })
 *
 * store.dispatch({ type: "app/start" })
 * store.dispatchUri("spotify:album:123")
 * ```
 */
export class AppStore {
  readonly logger: Logger

  readonly #update: AppUpdate
  readonly #subscribers = new Set<AppStoreSubscriber>()
  readonly #queue = new WorkQueue()

  #state: AppState

  constructor({
    initialState,
    logger: preferredLogger,
    onUpdate,
  }: AppStoreParams = {}) {
    const logger = preferredLogger ?? getLogger(["riffline", "state"])
    this.logger = logger.getChild("store")

    this.#update = createAppUpdate({ logger, onUpdate })
    this.#state = deepFreeze(initialState ?? initAppState())
  }

  get state(): AppState {
    return this.#state
  }

  /**
   * Applies an action and returns the events it produced, or the error that
   * stopped it. A failed action leaves the state as it was.
   *
   * @throws ReentrantDispatchError when called from inside a subscriber
   */
  dispatch(action: AppAction): AppUpdateResult {
    if (this.#queue.isProcessing) {
      throw new ReentrantDispatchError(action.type)
    }

    let outcome: AppUpdateResult | undefined
    this.#queue.enqueue(() => {
      outcome = this.#apply(action)
    })

    if (!outcome) {
      throw new Error(`dispatch('${action.type}') did not run`)
    }
    return outcome
  }

  /**
   * Dispatches the navigation action for a `spotify:` URI.
   *
   * @returns `undefined`, without dispatching, for a URI that doesn't parse
   */
  dispatchUri(uri: string): AppUpdateResult | undefined {
    const action = openUri(uri, this.logger)
    return action ? this.dispatch(action) : undefined
  }

  /**
   * @returns a function that removes the subscriber
   */
  subscribe(subscriber: AppStoreSubscriber): () => void {
    this.#subscribers.add(subscriber)
    return () => {
      this.#subscribers.delete(subscriber)
    }
  }

  readonly #deferredDispatch: Dispatch = action => {
    this.#queue.enqueue(() => {
      this.#apply(action)
    })
  }

  #apply(action: AppAction): AppUpdateResult {
    const [state, result] = this.#update(action, this.#state)
    this.#state = deepFreeze(state)

    if (result.type === "error") {
      this.logger.warn("{type} was not applied: {message}", {
        type: action.type,
        message: result.error.message,
      })
      return result
    }

    if (result.result.length > 0) {
      this.#notify(result.result)
    }
    return result
  }

  #notify(events: AppEvent[]) {
    for (const subscriber of [...this.#subscribers]) {
      try {
        subscriber(events, this.#deferredDispatch)
      } catch (error) {
        this.logger.error("subscriber threw while handling events: {error}", {
          error,
        })
      }
    }
  }
}
