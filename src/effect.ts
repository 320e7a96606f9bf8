/**
 * Effects
 * =======
 *
 * An effect is a value describing asynchronous work that yields at most one
 * follow-up action. Creating or mapping an effect never starts the work; only
 * a store executes effects, after the reducer that returned them has finished.
 */

/**
 * The asynchronous work wrapped by an effect. Resolving to `undefined` means
 * "no follow-up action".
 * @template A The action type produced by the work.
 */
export type EffectWork<A> = () => Promise<A | undefined>

/**
 * Deferred, at-most-once-yielding asynchronous computation.
 *
 * @template A The action type the effect may produce.
 *
 * @example
 * ```ts
 * const load = Effect.run(async () => {
 *   const user = await api.fetchUser(id)
 *   return { type: 'userLoaded', user } as const
 * })
 * ```
 */
export class Effect<A> {
  private constructor(private readonly work: EffectWork<A>) {}

  /**
   * Creates an effect from an asynchronous computation.
   */
  static run<A>(work: EffectWork<A>): Effect<A> {
    return new Effect(work)
  }

  /**
   * An effect that immediately yields `action`.
   */
  static send<A>(action: A): Effect<A> {
    return new Effect<A>(() => new Promise<A | undefined>((resolve) => resolve(action)))
  }

  /**
   * Merges two optional effects into one.
   *
   * When both are present the resulting effect starts both works together,
   * waits for both to finish and yields the left result if it has one,
   * otherwise the right result. Completion order does not affect the pick.
   *
   * Merging is not promised to be associative. With today's rule both
   * nestings of `a`, `b`, `c` yield the first defined action from left to
   * right, but they group the concurrent work differently, and callers should
   * not rely on the two being interchangeable.
   */
  static merge<A>(left: Effect<A> | undefined, right: Effect<A> | undefined): Effect<A> | undefined {
    if (!left) return right
    if (!right) return left

    return new Effect<A>(() => {
      const first = left.execute()
      const second = right.execute()
      return Promise.all([first, second])
        .then(() => first)
        .then((action) => (action !== undefined ? action : second))
    })
  }

  /**
   * Returns an effect that runs the same work and transforms the action it
   * yields. Used to lift a child's effects into a parent's action type.
   */
  map<B>(transform: (action: A) => B): Effect<B> {
    return new Effect<B>(() =>
      this.execute().then((action) => (action === undefined ? undefined : transform(action)))
    )
  }

  /**
   * Runs the wrapped work. Stores call this; reducers should not.
   * @internal
   */
  execute(): Promise<A | undefined> {
    return this.work()
  }
}
