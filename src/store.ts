/**
 * Store
 * =====
 *
 * A store owns one state value and one reducer. Actions go in through `send`,
 * the reducer produces the next state and optionally an effect, subscribers
 * are notified, and the effect runs asynchronously; whatever action it yields
 * is sent back into the same store.
 *
 * Stores form trees through `scope`: a child works on a lens-addressed slice
 * of its parent's state and writes every change back up, so the parent's
 * subscribers observe it without the parent's reducer running.
 *
 * All state transitions within a tree go through one `SerialExecutor`.
 */

import type { Effect } from './effect'
import { SerialExecutor } from './executor'
import type { Lens } from './lens'
import { toReducer, type Reducer, type ReducerLike } from './reducer'

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * Minimal logging surface used by stores. `console` satisfies it.
 */
export interface StoreLogger {
  debug(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

/**
 * Receives errors thrown by an effect's work or by the dispatch of the
 * action it produced, with the name of the store that ran the effect.
 */
export type EffectErrorHandler = (error: unknown, storeName: string) => void

export interface StoreOptions {
  /** Label used in log messages. Children default to `<parent>.<n>`. */
  name?: string
  /** Defaults to `console`. Inherited by scoped children. */
  logger?: StoreLogger
  /** Log every dispatched action at debug level. Inherited by scoped children. */
  debug?: boolean
  /** Defaults to logging through `logger.error`. Inherited by scoped children. */
  onEffectError?: EffectErrorHandler
}

/**
 * Options for `scope`.
 * @template ParentAction The action type of the store being scoped.
 */
export interface ScopeOptions<ParentAction> extends StoreOptions {
  /**
   * Recognizes values the child may forward to the parent. Without it every
   * forwarded value is dropped.
   */
  isParentAction?: (value: unknown) => value is ParentAction
}

/**
 * Called after every state change with the new and the previous state.
 */
export type StateListener<S> = (state: S, previous: S) => void

// =============================================================================
// PARENT HANDLE
// =============================================================================

/**
 * What a child store knows about its parent. The parent's own state and
 * action types are hidden; the lens and the parent are captured when the
 * handle is built, so only a correctly typed child state can be written.
 *
 * @template Local The child's state type.
 */
export interface StoreHandle<Local> {
  /** Writes a new child state into the parent and publishes the parent. */
  acceptState(value: Local): void

  /**
   * Sends `action` to the parent if the parent recognizes it.
   * @returns `false` when the value was dropped.
   */
  forward(action: unknown): boolean
}

/**
 * The store type for a given reducer.
 */
export type StoreOf<R> = R extends Reducer<infer S, infer A> ? Store<S, A> : never

// =============================================================================
// STORE
// =============================================================================

/**
 * @template S The state type.
 * @template A The action type. `never` makes the store impossible to send to.
 */
export class Store<S, A> {
  readonly name: string

  private current: S
  private readonly reducer: Reducer<S, A>
  private readonly listeners = new Set<StateListener<S>>()
  private readonly inFlight = new Set<Promise<void>>()
  // this store's in-flight set, then each ancestor's
  private tracking: Array<Set<Promise<void>>> = [this.inFlight]
  private readonly logger: StoreLogger
  private readonly debug: boolean
  private readonly onEffectError: EffectErrorHandler
  private executor = new SerialExecutor()
  private parent: StoreHandle<S> | undefined
  private children = 0

  constructor(initialState: S, reducer: ReducerLike<S, A>, options: StoreOptions = {}) {
    this.current = initialState
    this.reducer = toReducer(reducer)
    this.name = options.name ?? 'store'
    const logger = options.logger ?? console
    this.logger = logger
    this.debug = options.debug ?? false
    this.onEffectError = options.onEffectError ??
      ((error, storeName) => logger.error(`[unistate:${storeName}] Effect failed.`, error))
  }

  /**
   * Creates a root store.
   *
   * @example
   * ```ts
   * const store = Store.init({ count: 0 }, (state, action: 'inc') => ({
   *   state: { count: state.count + 1 }
   * }))
   * store.send('inc')
   * ```
   */
  static init<S, A>(initialState: S, reducer: ReducerLike<S, A>, options?: StoreOptions): Store<S, A> {
    return new Store(initialState, reducer, options)
  }

  /** The current state. */
  get state(): S {
    return this.current
  }

  /** Whether this store was created through `scope`. */
  get isScoped(): boolean {
    return this.parent !== undefined
  }

  private get prefix(): string {
    return `[unistate:${this.name}]`
  }

  /**
   * Registers a listener called synchronously after every state change.
   * @returns A function that removes the listener.
   */
  subscribe(listener: StateListener<S>): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Dispatches an action. When called outside any other dispatch, the state
   * is updated, subscribers are notified and the parent chain is updated
   * before `send` returns. Calls made during a dispatch run right after it.
   */
  send(action: A): void {
    this.executor.execute(() => this.dispatch(action))
  }

  /**
   * Dispatches each action in order, each one completely before the next.
   * Effects from earlier actions do not hold up later ones.
   */
  sendAll(actions: Iterable<A>): void {
    for (const action of actions) {
      this.send(action)
    }
  }

  /**
   * Writes `value` at `lens` without running the reducer, then notifies
   * subscribers and the parent chain. Always publishes, even when the value
   * is unchanged.
   */
  update<V>(lens: Lens<S, V>, value: V): void {
    this.executor.execute(() => this.write(lens.set(this.current, value)))
  }

  /**
   * Creates a child store over the slice of this store's state at `lens`.
   *
   * The child starts from a copy of the current slice and runs its own
   * reducer. Each change in the child is written back into this store through
   * `lens.set` and published to this store's subscribers; this store's reducer
   * is not involved. Changes made to this store afterwards are not pushed down
   * into the child.
   */
  scope<L, LA>(lens: Lens<S, L>, reducer: ReducerLike<L, LA>, options: ScopeOptions<A> = {}): Store<L, LA> {
    const { isParentAction, ...storeOptions } = options
    const child = new Store<L, LA>(lens.get(this.current), reducer, {
      name: `${this.name}.${this.children++}`,
      logger: this.logger,
      debug: this.debug,
      onEffectError: this.onEffectError,
      ...storeOptions
    })

    child.executor = this.executor
    child.tracking = [child.inFlight, ...this.tracking]
    child.parent = {
      acceptState: (value) => this.write(lens.set(this.current, value)),
      forward: (action) => {
        if (isParentAction !== undefined && isParentAction(action)) {
          this.send(action)
          return true
        }
        this.logger.warn(`${child.prefix} Action forwarded to "${this.name}" was not recognized and has been dropped.`, action)
        return false
      }
    }

    return child
  }

  /**
   * Forwards an action to the parent store. The parent's action type is not
   * known here; the parent checks the value with the `isParentAction` guard
   * given to `scope` and drops it, with a warning, when it does not match.
   *
   * @returns Whether the parent accepted the action.
   */
  forward(action: unknown): boolean {
    if (!this.parent) {
      this.logger.warn(`${this.prefix} forward() called on a store without a parent; action dropped.`, action)
      return false
    }
    return this.parent.forward(action)
  }

  /**
   * Resolves once no effect started by this store or by any of its scoped
   * descendants is still running, including effects started by the actions
   * those effects produced. Effects of the parent and of siblings are not
   * waited for.
   */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight)
    }
  }

  private dispatch(action: A): void {
    if (this.debug) {
      this.logger.debug(`${this.prefix} send`, action)
    }

    const { state, effect } = this.reducer.reduce(this.current, action)
    this.write(state)

    if (effect) {
      this.schedule(effect)
    }
  }

  private write(next: S): void {
    const previous = this.current
    this.current = next
    this.parent?.acceptState(next)
    for (const listener of [...this.listeners]) {
      listener(next, previous)
    }
  }

  private schedule(effect: Effect<A>): void {
    const ref = new WeakRef(this)
    const name = this.name
    const logger = this.logger
    const onEffectError = this.onEffectError
    const tracking = this.tracking

    const task: Promise<void> = Promise.resolve()
      .then(() => effect.execute())
      .then((action) => {
        if (action === undefined) return

        const store = ref.deref()
        if (!store) {
          logger.debug(`[unistate:${name}] Store released before its effect completed; action dropped.`, action)
          return
        }
        store.send(action)
      })
      .catch((error: unknown) => onEffectError(error, name))
      .finally(() => {
        for (const inFlight of tracking) inFlight.delete(task)
      })

    for (const inFlight of tracking) inFlight.add(task)
  }
}
