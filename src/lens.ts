// =============================================================================
// LENS SYSTEM FOR COMPOSABLE UPDATES
// =============================================================================

/**
 * A lens provides composable, immutable access to a value embedded in a
 * larger structure. Stores use lenses to carve a child state out of a parent
 * state and to write it back.
 *
 * Lenses are expected to obey the lens laws:
 * - `get(set(root, value))` equals `value`
 * - `set(root, get(root))` equals `root`
 *
 * @template TRoot The root data structure type.
 * @template TFocus The focused value type.
 */
export interface Lens<TRoot, TFocus> {
  /** Get the focused value from the root. */
  get(root: TRoot): TFocus

  /** Set a new value at the focus, returning an updated root. */
  set(root: TRoot, value: TFocus): TRoot

  /** Update the focused value using a function, returning an updated root. */
  update(root: TRoot, updater: (focus: TFocus) => TFocus): TRoot

  /** Compose with another lens to focus deeper. */
  compose<TNext>(next: Lens<TFocus, TNext>): Lens<TRoot, TNext>

  /** Focus on a property of the current focus. */
  at<TKey extends keyof TFocus>(key: TKey): Lens<TRoot, TFocus[TKey]>
}

/**
 * Create a lens with getter and setter functions.
 *
 * @param getter Function to extract the focused value from the root.
 * @param setter Function to create a new root with the focused value replaced.
 *
 * @example
 * ```ts
 * const nameLens = lens(
 *   (user: User) => user.name,
 *   (user: User, name: string) => ({ ...user, name })
 * )
 * ```
 */
export function lens<TRoot, TFocus>(
  getter: (root: TRoot) => TFocus,
  setter: (root: TRoot, value: TFocus) => TRoot
): Lens<TRoot, TFocus> {
  const l: Lens<TRoot, TFocus> = {
    get: getter,
    set: setter,
    update: (root, updater) => setter(root, updater(getter(root))),

    compose: <TNext>(next: Lens<TFocus, TNext>) =>
      lens<TRoot, TNext>(
        (root) => next.get(getter(root)),
        (root, value) => setter(root, next.set(getter(root), value))
      ),

    at: <TKey extends keyof TFocus>(key: TKey) => l.compose(prop<TFocus, TKey>(key))
  }

  return l
}

/**
 * A lens onto one property of an object, or one index of an array or tuple,
 * copying the container on write. Arrays stay arrays.
 *
 * @example
 * ```ts
 * const count = prop<{ count: number; name: string }, 'count'>('count')
 * count.set({ count: 0, name: 'x' }, 1) // { count: 1, name: 'x' }
 * ```
 */
export function prop<TRoot, TKey extends keyof TRoot>(key: TKey): Lens<TRoot, TRoot[TKey]> {
  return lens<TRoot, TRoot[TKey]>(
    (root) => root[key],
    (root, value) => Object.assign(Array.isArray(root) ? [] : {}, root, { [key]: value })
  )
}

/**
 * The lens focusing on the whole value.
 */
export function identity<T>(): Lens<T, T> {
  return lens<T, T>(
    (root) => root,
    (_root, value) => value
  )
}

/**
 * Checks both lens laws for one `(root, value)` pair.
 *
 * @param equals Equality used to compare results; defaults to structural equality.
 */
export function satisfiesLensLaws<TRoot, TFocus>(
  l: Lens<TRoot, TFocus>,
  root: TRoot,
  value: TFocus,
  equals: (a: unknown, b: unknown) => boolean = structuralEqual
): boolean {
  return equals(l.get(l.set(root, value)), value) && equals(l.set(root, l.get(root)), root)
}

/**
 * Structural equality over plain data: primitives, arrays, dates and plain
 * objects. Any other object (a `Map`, a `Set`, a class instance) is only
 * equal to itself.
 */
export function structuralEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((item, i) => structuralEqual(item, b[i]))
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && Object.is(a.getTime(), b.getTime())
  }

  if (!isPlainObject(a) || !isPlainObject(b)) return false

  const keysA = Object.keys(a)
  const keysB = Object.keys(b)
  if (keysA.length !== keysB.length) return false
  return keysA.every((key) => Object.prototype.hasOwnProperty.call(b, key) &&
    structuralEqual(Reflect.get(a, key), Reflect.get(b, key)))
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
