/**
 * unistate: Unidirectional State Container
 * ========================================
 *
 * A value-typed state container changed only through actions, with side
 * effects modeled as deferred asynchronous computations that may send
 * further actions. Features:
 *
 * - Reducers with a composition algebra and left-biased effect merging
 * - Effects as inert, mappable values executed by the store
 * - Lenses as first-class get/set pairs for addressing nested state
 * - Scoped child stores that write their changes back into the parent
 * - A serial executor per store tree so transitions never interleave
 * - Read-only stores that cannot be sent actions at all
 *
 * @license MIT
 */

// =============================================================================
// EXPORTS
// =============================================================================

export { Effect } from './effect'
export type { EffectWork } from './effect'

export {
  absurd,
  combine,
  combineReducers,
  createReducer,
  isActionOfType,
  neverReducer,
  reducer,
  toReducer
} from './reducer'
export type { ReduceFn, Reducer, ReducerLike, Reduction, TypedAction } from './reducer'

export { identity, lens, prop, satisfiesLensLaws, structuralEqual } from './lens'
export type { Lens } from './lens'

export { SerialExecutor } from './executor'

export { Store } from './store'
export type {
  EffectErrorHandler,
  ScopeOptions,
  StateListener,
  StoreHandle,
  StoreLogger,
  StoreOf,
  StoreOptions
} from './store'

export { ReadOnlyStore } from './read-only'

export { createStoreContext } from './ergonomic'
export type { StoreContext } from './ergonomic'
