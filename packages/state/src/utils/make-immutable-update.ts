import { create, type Patch } from "mutative"

export type ImmutableUpdateOptions<Output> = {
  /** Receives the patches of every committed update that changed something */
  onPatch?: (patches: Patch[]) => void
  /**
   * Decides from the update's output whether its changes are kept. A
   * rejected update returns the input model untouched.
   */
  shouldCommit?: (output: Output) => boolean
}

/**
 * Builds an immutable update function from one that mutates its model in
 * place.
 *
 * The mutating function runs against a mutative draft, so it can use plain
 * assignment and array methods while callers only ever see a new model (or
 * the same model, when nothing changed or the update was rejected).
 *
 * @returns an update function that returns `[model, output]`
 */
export function makeImmutableUpdate<Msg, Model extends object, Output>(
  mutatingUpdate: (msg: Msg, model: Model) => Output,
  { onPatch, shouldCommit = () => true }: ImmutableUpdateOptions<Output> = {},
): (msg: Msg, model: Model) => [Model, Output] {
  return (msg: Msg, model: Model) => {
    let captured: { output: Output } | undefined

    const [newModel, patches] = create(
      model,
      draft => {
        captured = { output: mutatingUpdate(msg, draft as Model) }
      },
      { enablePatches: true },
    )

    if (!captured) {
      throw new Error("makeImmutableUpdate: the update did not run")
    }

    const { output } = captured
    if (!shouldCommit(output)) {
      return [model, output]
    }

    if (onPatch && patches.length > 0) {
      onPatch(patches)
    }

    return [newModel, output]
  }
}
