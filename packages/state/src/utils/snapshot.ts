import { current, isDraft } from "mutative"

/**
 * Returns a plain copy of `value` when it is a mutative draft, or `value`
 * itself otherwise. Anything that leaves a draft (moved into another substate
 * or returned to the caller) goes through here first.
 */
export function snapshot<T extends object>(value: T): T {
  return isDraft(value) ? current(value) : value
}
