// =============================================================================
// REDUCER PROTOCOL
// =============================================================================

import { UnhandledActionError } from './errors'
import { createLogger, type Logger } from './logger'
import type { RadixState } from './radix-state'

export interface Action {
  readonly type: string
}

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error })

/**
 * What a reducer made of an action. Only `applied` carries a new snapshot;
 * `not_applicable` means the action addressed something that is not there.
 */
export type ReducerOutcome =
  | { readonly kind: 'unchanged' }
  | { readonly kind: 'applied'; readonly state: RadixState }
  | { readonly kind: 'not_applicable'; readonly reason: string }

export const unchanged = (): ReducerOutcome => ({ kind: 'unchanged' })
export const applied = (state: RadixState): ReducerOutcome => ({ kind: 'applied', state })
export const notApplicable = (reason: string): ReducerOutcome => ({ kind: 'not_applicable', reason })

export interface ReducerContext {
  readonly logger: Logger
}

export type ActionHandler<TAction extends Action> = (
  state: RadixState,
  action: TAction,
  ctx: ReducerContext
) => ReducerOutcome

export type ActionHandlers<TAction extends Action> = {
  [K in TAction['type']]: ActionHandler<Extract<TAction, { type: K }>>
}

export interface Reducer<TAction extends Action> {
  readonly target: string
  reduce(state: RadixState, action: TAction, ctx?: ReducerContext): Result<ReducerOutcome, UnhandledActionError>
}

/**
 * Builds a reducer from one handler per action type. The handler map must be
 * exhaustive over the action union; an action arriving at runtime with a type
 * outside it yields an `UnhandledActionError`.
 *
 * @example
 * ```ts
 * type ModeAction = { type: 'lateral' } | { type: 'plain' }
 *
 * const modes = createReducer<ModeAction>('modes', {
 *   lateral: state => (state.lateral ? unchanged() : applied({ ...state, lateral: true })),
 *   plain: state => (state.lateral ? applied({ ...state, lateral: false }) : unchanged())
 * })
 * ```
 */
export function createReducer<TAction extends Action>(
  target: string,
  handlers: ActionHandlers<TAction>
): Reducer<TAction> {
  const defaultContext: ReducerContext = { logger: createLogger(`Reducer:${target}`) }

  return {
    target,
    reduce: (state, action, ctx = defaultContext) => {
      const type: string = action.type
      if (!Object.hasOwn(handlers, type)) {
        return err(new UnhandledActionError(target, type))
      }
      const handler = handlers[action.type as TAction['type']]
      return ok(handler(state, action as Extract<TAction, { type: TAction['type'] }>, ctx))
    }
  }
}
