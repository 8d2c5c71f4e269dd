import type { AppEvent } from "./app-event.js"
import type { SubstateUpdate } from "./substates/updatable-state.js"

/**
 * Applies a substate's own action through that substate's update contract and
 * lifts the resulting events into the application's event stream.
 *
 * No logic of its own: event order is exactly the order the substate
 * reported.
 */
export function forwardAction<State, Action, Event>(
  action: Action,
  state: State,
  update: SubstateUpdate<State, Action, Event>,
  lift: (event: Event) => AppEvent,
): AppEvent[] {
  return update(state, action).map(lift)
}
