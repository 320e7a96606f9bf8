import type { Lens } from './lens'
import { neverReducer, type ReducerLike } from './reducer'
import { Store, type ScopeOptions, type StateListener, type StoreOptions } from './store'

/**
 * A store that exposes its state but accepts no actions.
 *
 * The wrapped store's action type is `never`, so nothing can be sent to it
 * and its reducer can never run. The only way to change the state is through
 * a child created with `scope`, whose changes propagate back up here.
 *
 * @template S The state type.
 */
export class ReadOnlyStore<S> {
  private readonly store: Store<S, never>

  constructor(initialState: S, options?: StoreOptions) {
    this.store = new Store(initialState, neverReducer<S>(), options)
  }

  static init<S>(initialState: S, options?: StoreOptions): ReadOnlyStore<S> {
    return new ReadOnlyStore(initialState, options)
  }

  get state(): S {
    return this.store.state
  }

  get name(): string {
    return this.store.name
  }

  subscribe(listener: StateListener<S>): () => void {
    return this.store.subscribe(listener)
  }

  /**
   * Creates a mutable child store over the slice at `lens`.
   * @see Store.scope
   */
  scope<L, LA>(lens: Lens<S, L>, reducer: ReducerLike<L, LA>, options?: ScopeOptions<never>): Store<L, LA> {
    return this.store.scope(lens, reducer, options)
  }
}
