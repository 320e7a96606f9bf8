/**
 * Ergonomic Store Context (with unctx)
 * ====================================
 *
 * Lets setup code reach a store without passing it down explicitly.
 * `createStoreContext` returns a typed context; `provide` registers a store
 * as the active one, `use()` retrieves it and `useScope()` derives a child
 * store from it.
 *
 * --- ASYNC USAGE ---
 * As with all `unctx` contexts, the store is only available synchronously.
 * Read it into a local variable before the first `await`.
 */

import { getContext } from 'unctx'
import type { Lens } from './lens'
import type { ReducerLike } from './reducer'
import type { ScopeOptions, Store } from './store'

/**
 * A typed, namespaced slot holding the active store.
 * @template S The store's state type.
 * @template A The store's action type.
 */
export interface StoreContext<S, A> {
  /** Makes `store` the active store for this context. Replaces any previous one. */
  provide(store: Store<S, A>): Store<S, A>

  /** Clears the active store. */
  release(): void

  /** The active store. Throws if none is provided. */
  use(): Store<S, A>

  /** The active store, or `null` if none is provided. */
  tryUse(): Store<S, A> | null

  /**
   * Runs `fn` with `store` active. Throws if a different store has been
   * provided and not released.
   */
  call<R>(store: Store<S, A>, fn: () => R): R

  /** Scopes the active store. */
  useScope<L, LA>(lens: Lens<S, L>, reducer: ReducerLike<L, LA>, options?: ScopeOptions<A>): Store<L, LA>
}

/**
 * Creates a store context under a unique key.
 *
 * @example
 * ```ts
 * const appStore = createStoreContext<AppState, AppAction>('app-store')
 * appStore.provide(Store.init(initialState, appReducer))
 *
 * function setupCounter() {
 *   return appStore.useScope(prop('counter'), counterReducer)
 * }
 * ```
 */
export function createStoreContext<S, A>(key: string): StoreContext<S, A> {
  const ctx = getContext<Store<S, A>>(key)

  const use = (): Store<S, A> => {
    const store = ctx.tryUse()
    if (store === null || store === undefined) {
      throw new Error(`[unistate] No store provided for context "${key}".`)
    }
    return store
  }

  return {
    provide: (store) => {
      ctx.set(store, true)
      return store
    },
    release: () => ctx.unset(),
    use,
    tryUse: () => ctx.tryUse() ?? null,
    call: (store, fn) => ctx.call(store, fn),
    useScope: (lens, reducer, options) => use().scope(lens, reducer, options)
  }
}
