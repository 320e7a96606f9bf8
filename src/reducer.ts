// =============================================================================
// REDUCER SYSTEM FOR ACTION-BASED STATE MANAGEMENT
// =============================================================================

import { Effect } from './effect'

/**
 * The result of reducing one action: the next state and an optional effect.
 * @template S The state type.
 * @template A The action type.
 */
export interface Reduction<S, A> {
  readonly state: S
  readonly effect?: Effect<A>
}

/**
 * A pure reduce function. Asynchronous work goes in the returned effect.
 */
export type ReduceFn<S, A> = (state: S, action: A) => Reduction<S, A>

/**
 * A reducer handles actions for one state type and may be combined with
 * other reducers over the same state and action types.
 *
 * @template S The state type.
 * @template A The action type.
 */
export interface Reducer<S, A> {
  reduce(state: S, action: A): Reduction<S, A>

  /** Runs this reducer, then `other`, on the same action. */
  combined(other: Reducer<S, A>): Reducer<S, A>
}

/**
 * Anything a store accepts as its reducer.
 */
export type ReducerLike<S, A> = Reducer<S, A> | ReduceFn<S, A>

/**
 * Action interface with required type property.
 */
export interface TypedAction {
  readonly type: string
}

/**
 * Lifts a reduce function into a `Reducer`.
 *
 * @example
 * ```ts
 * const counter = reducer<number, 'inc' | 'dec'>((count, action) => ({
 *   state: action === 'inc' ? count + 1 : count - 1
 * }))
 * ```
 */
export function reducer<S, A>(reduce: ReduceFn<S, A>): Reducer<S, A> {
  const self: Reducer<S, A> = {
    reduce,
    combined: (other) => combine(self, other)
  }
  return self
}

/**
 * Normalizes a `ReducerLike` into a `Reducer`.
 */
export function toReducer<S, A>(value: ReducerLike<S, A>): Reducer<S, A> {
  return typeof value === 'function' ? reducer(value) : value
}

/**
 * Combines two reducers over the same state and action types.
 *
 * Both reducers see the same action. `first` runs against the incoming state
 * and `second` runs against the state `first` produced. Their effects are
 * merged with {@link Effect.merge}: both run concurrently and the first
 * reducer's action wins whenever it produces one.
 */
export function combine<S, A>(first: ReducerLike<S, A>, second: ReducerLike<S, A>): Reducer<S, A> {
  const left = toReducer(first)
  const right = toReducer(second)

  return reducer((state, action) => {
    const a = left.reduce(state, action)
    const b = right.reduce(a.state, action)
    const effect = Effect.merge(a.effect, b.effect)
    return effect ? { state: b.state, effect } : { state: b.state }
  })
}

/**
 * Combines any number of reducers from left to right.
 * With no arguments the result leaves state untouched.
 */
export function combineReducers<S, A>(...reducers: Array<ReducerLike<S, A>>): Reducer<S, A> {
  const [head, ...rest] = reducers
  if (head === undefined) return reducer((state) => ({ state }))
  return rest.reduce<Reducer<S, A>>((acc, next) => combine(acc, next), toReducer(head))
}

/**
 * Creates a type-safe reducer from action type to handler mappings.
 * Actions with no handler leave the state unchanged.
 *
 * @example
 * ```ts
 * type CounterAction =
 *   | { type: 'increment'; payload?: number }
 *   | { type: 'reset' }
 *
 * const counter = createReducer<{ count: number }, CounterAction>({
 *   increment: (state, action) => ({ state: { count: state.count + (action.payload ?? 1) } }),
 *   reset: () => ({ state: { count: 0 } })
 * })
 * ```
 */
export function createReducer<S, A extends TypedAction>(
  handlers: { [K in A['type']]?: (state: S, action: Extract<A, { type: K }>) => Reduction<S, A> }
): Reducer<S, A> {
  return reducer((state, action) => {
    const type: A['type'] = action.type
    const handler = handlers[type]
    return handler && isActionOfType(action, type) ? handler(state, action) : { state }
  })
}

/**
 * Narrows a discriminated-union action to the member tagged `type`.
 */
export function isActionOfType<A extends TypedAction, K extends A['type']>(
  action: A,
  type: K
): action is Extract<A, { type: K }> {
  return action.type === type
}

/**
 * Marks code that can only run with a value of type `never`.
 */
export function absurd(value: never): never {
  throw new Error(`[unistate] Unreachable code reached with ${String(value)}`)
}

/**
 * A reducer for stores that accept no actions. Its body cannot be reached
 * because no value of type `never` exists.
 */
export function neverReducer<S>(): Reducer<S, never> {
  return reducer<S, never>((_state, action) => absurd(action))
}
