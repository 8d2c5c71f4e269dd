/**
 * The contract every substate exposes to the composite state: apply one of
 * its own actions to its own slice, in place, and report what changed.
 *
 * Implementations mutate `state` directly. The composite update runs them on
 * a mutative draft, so callers outside the engine never see a half-applied
 * change.
 */
export type SubstateUpdate<State, Action, Event> = (
  state: State,
  action: Action,
) => Event[]
