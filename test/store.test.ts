import { describe, it, expect, vi } from 'vitest'
import { Effect } from '../src/effect'
import { prop } from '../src/lens'
import { createReducer, reducer } from '../src/reducer'
import { Store, type StoreLogger } from '../src/store'

type CounterAction =
  | { type: 'increment' }
  | { type: 'add'; amount: number }
  | { type: 'incrementLater'; ms: number }
  | { type: 'noopLater' }

interface CounterState {
  count: number
  name: string
}

const counterReducer = createReducer<CounterState, CounterAction>({
  increment: (state) => ({ state: { ...state, count: state.count + 1 } }),
  add: (state, action) => ({ state: { ...state, count: state.count + action.amount } }),
  incrementLater: (state, action) => ({
    state,
    effect: Effect.run<CounterAction>(
      () => new Promise((resolve) => setTimeout(() => resolve({ type: 'increment' }), action.ms))
    )
  }),
  noopLater: (state) => ({ state, effect: Effect.run<CounterAction>(async () => undefined) })
})

const createLogger = () => ({ debug: vi.fn(), warn: vi.fn(), error: vi.fn() }) satisfies StoreLogger

describe('Store', () => {
  describe('Store.init', () => {
    it('should expose the initial state', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      expect(store.state).toEqual({ count: 0, name: 'x' })
      expect(store.name).toBe('store')
      expect(store.isScoped).toBe(false)
    })

    it('should accept a plain reduce function', () => {
      const store = Store.init(0, (n: number, action: 'inc' | 'dec') => ({
        state: action === 'inc' ? n + 1 : n - 1
      }))

      store.send('inc')
      store.send('inc')
      store.send('dec')

      expect(store.state).toBe(1)
    })
  })

  describe('send', () => {
    it('should update state synchronously', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      store.send({ type: 'add', amount: 5 })
      expect(store.state).toEqual({ count: 5, name: 'x' })
    })

    it('should notify subscribers with the new and previous state', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      const listener = vi.fn()
      store.subscribe(listener)

      store.send({ type: 'increment' })

      expect(listener).toHaveBeenCalledTimes(1)
      expect(listener).toHaveBeenCalledWith({ count: 1, name: 'x' }, { count: 0, name: 'x' })
    })

    it('should notify on every dispatch even when state is unchanged', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      const listener = vi.fn()
      store.subscribe(listener)

      store.send({ type: 'noopLater' })

      expect(listener).toHaveBeenCalledTimes(1)
    })

    it('should stop notifying after unsubscribe', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      const listener = vi.fn()
      const unsubscribe = store.subscribe(listener)

      store.send({ type: 'increment' })
      unsubscribe()
      store.send({ type: 'increment' })

      expect(listener).toHaveBeenCalledTimes(1)
      expect(store.state.count).toBe(2)
    })

    it('should produce the same state for the same state and action', () => {
      const first = Store.init({ count: 3, name: 'x' }, counterReducer)
      const second = Store.init({ count: 3, name: 'x' }, counterReducer)

      first.send({ type: 'add', amount: 4 })
      second.send({ type: 'add', amount: 4 })

      expect(first.state).toEqual(second.state)
      expect(first.state).toEqual({ count: 7, name: 'x' })
    })

    it('should log dispatched actions in debug mode', () => {
      const logger = createLogger()
      const store = Store.init({ count: 0, name: 'x' }, counterReducer, { name: 'counter', logger, debug: true })

      store.send({ type: 'increment' })

      expect(logger.debug).toHaveBeenCalledWith('[unistate:counter] send', { type: 'increment' })
    })

    it('should not log dispatched actions by default', () => {
      const logger = createLogger()
      const store = Store.init({ count: 0, name: 'x' }, counterReducer, { logger })

      store.send({ type: 'increment' })

      expect(logger.debug).not.toHaveBeenCalled()
    })
  })

  describe('sendAll', () => {
    it('should match sending each action in turn', () => {
      const batched = Store.init({ count: 0, name: 'x' }, counterReducer)
      const oneByOne = Store.init({ count: 0, name: 'x' }, counterReducer)

      batched.sendAll([{ type: 'increment' }, { type: 'add', amount: 10 }])
      oneByOne.send({ type: 'increment' })
      oneByOne.send({ type: 'add', amount: 10 })

      expect(batched.state).toEqual(oneByOne.state)
    })

    it('should publish each intermediate state in order', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      const seen: number[] = []
      store.subscribe((state) => seen.push(state.count))

      store.sendAll([{ type: 'increment' }, { type: 'add', amount: 10 }])

      expect(seen).toEqual([1, 11])
    })

    it('should accept any iterable', () => {
      const store = Store.init(0, (n: number, action: number) => ({ state: n + action }))
      store.sendAll(new Set([1, 2, 3]))
      expect(store.state).toBe(6)
    })

    it('should not wait for effects of earlier actions', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)

      store.sendAll([{ type: 'incrementLater', ms: 5 }, { type: 'add', amount: 2 }])

      expect(store.state.count).toBe(2)
    })
  })

  describe('effects', () => {
    it('should not start an effect before send returns', async () => {
      const work = vi.fn(async (): Promise<'done' | undefined> => undefined)
      const store = Store.init<string, 'start' | 'done'>('idle', (_state, action) => ({
        state: action,
        effect: action === 'start' ? Effect.run(work) : undefined
      }))

      store.send('start')
      expect(work).not.toHaveBeenCalled()

      await store.settled()
      expect(work).toHaveBeenCalledTimes(1)
    })

    it('should dispatch the action an effect yields', async () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      const seen: number[] = []
      store.subscribe((state) => seen.push(state.count))

      store.send({ type: 'incrementLater', ms: 1 })
      expect(store.state.count).toBe(0)

      await store.settled()
      expect(store.state.count).toBe(1)
      expect(seen).toEqual([0, 1])
    })

    it('should do nothing further when an effect yields no action', async () => {
      const reduce = vi.fn(counterReducer.reduce)
      const store = Store.init({ count: 0, name: 'x' }, reduce)

      store.send({ type: 'noopLater' })
      await store.settled()

      expect(reduce).toHaveBeenCalledTimes(1)
    })

    it('should dispatch follow-up actions in completion order', async () => {
      type Action = { type: 'start'; label: string; ms: number } | { type: 'finished'; label: string }
      const store = Store.init<string[], Action>([], (log, action) => {
        if (action.type === 'finished') return { state: [...log, action.label] }
        return {
          state: log,
          effect: Effect.run<Action>(
            () => new Promise((resolve) => setTimeout(() => resolve({ type: 'finished', label: action.label }), action.ms))
          )
        }
      })

      store.send({ type: 'start', label: 'slow', ms: 20 })
      store.send({ type: 'start', label: 'fast', ms: 1 })
      await store.settled()

      expect(store.state).toEqual(['fast', 'slow'])
    })

    it('should wait for chained effects in settled()', async () => {
      type Step = 'start' | 'middle' | 'end'
      const store = Store.init<Step[], Step>([], (log, action) => ({
        state: [...log, action],
        effect: action === 'start' ? Effect.send<Step>('middle') : action === 'middle' ? Effect.send<Step>('end') : undefined
      }))

      store.send('start')
      await store.settled()

      expect(store.state).toEqual(['start', 'middle', 'end'])
    })

    it('should report a failing effect and leave state untouched', async () => {
      const onEffectError = vi.fn()
      const failure = new Error('request failed')
      const store = Store.init(
        0,
        (n: number, action: 'fail') => ({
          state: n + 1,
          effect: Effect.run<'fail'>(async () => {
            throw failure
          })
        }),
        { name: 'failing', onEffectError }
      )

      store.send('fail')
      await store.settled()

      expect(onEffectError).toHaveBeenCalledWith(failure, 'failing')
      expect(store.state).toBe(1)
    })

    it('should log a failing effect through the logger by default', async () => {
      const logger = createLogger()
      const failure = new Error('boom')
      const store = Store.init(
        0,
        (n: number, _action: 'go') => ({
          state: n,
          effect: Effect.run<'go'>(async () => {
            throw failure
          })
        }),
        { name: 'effects', logger }
      )

      store.send('go')
      await store.settled()

      expect(logger.error).toHaveBeenCalledWith('[unistate:effects] Effect failed.', failure)
    })

    it('should still dispatch queued actions when a subscriber throws during an effect follow-up', async () => {
      const onEffectError = vi.fn()
      const failure = new Error('listener failed')
      const store = Store.init({ count: 0, name: 'x' }, counterReducer, { onEffectError })
      let thrown = false
      store.subscribe((state) => {
        if (state.count === 1 && !thrown) {
          thrown = true
          store.send({ type: 'add', amount: 10 })
          throw failure
        }
      })

      store.send({ type: 'incrementLater', ms: 1 })
      await store.settled()

      expect(store.state.count).toBe(11)
      expect(onEffectError).toHaveBeenCalledTimes(1)
      expect(onEffectError).toHaveBeenCalledWith(failure, 'store')
    })

    it('should drop the follow-up action once the store has been released', async () => {
      vi.stubGlobal('WeakRef', class {
        deref(): undefined {
          return undefined
        }
      })
      try {
        const logger = createLogger()
        const store = Store.init({ count: 0, name: 'x' }, counterReducer, { name: 'released', logger })

        store.send({ type: 'incrementLater', ms: 1 })
        await store.settled()

        expect(store.state.count).toBe(0)
        expect(logger.debug).toHaveBeenCalledWith(
          '[unistate:released] Store released before its effect completed; action dropped.',
          { type: 'increment' }
        )
      } finally {
        vi.unstubAllGlobals()
      }
    })

    it('should resolve settled() immediately when nothing is running', async () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      await expect(store.settled()).resolves.toBeUndefined()
    })
  })

  describe('re-entrancy', () => {
    it('should run a send made from a subscriber after the current dispatch', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      const log: string[] = []

      store.subscribe((state) => {
        log.push(`first saw ${state.count}`)
        if (state.count === 1) {
          store.send({ type: 'increment' })
          log.push(`after nested send ${store.state.count}`)
        }
      })
      store.subscribe((state) => log.push(`second saw ${state.count}`))

      store.send({ type: 'increment' })

      expect(log).toEqual([
        'first saw 1',
        'after nested send 1',
        'second saw 1',
        'first saw 2',
        'second saw 2'
      ])
      expect(store.state.count).toBe(2)
    })
  })

  describe('update', () => {
    it('should write through the lens without running the reducer', () => {
      const reduce = vi.fn(counterReducer.reduce)
      const store = Store.init({ count: 0, name: 'x' }, reducer(reduce))
      const listener = vi.fn()
      store.subscribe(listener)

      store.update(prop<CounterState, 'name'>('name'), 'renamed')

      expect(store.state).toEqual({ count: 0, name: 'renamed' })
      expect(listener).toHaveBeenCalledWith({ count: 0, name: 'renamed' }, { count: 0, name: 'x' })
      expect(reduce).not.toHaveBeenCalled()
    })

    it('should publish an equal state when the value is unchanged', () => {
      const store = Store.init({ count: 4, name: 'x' }, counterReducer)
      const published: CounterState[] = []
      store.subscribe((state) => published.push(state))

      const countLens = prop<CounterState, 'count'>('count')
      store.update(countLens, countLens.get(store.state))

      expect(published).toEqual([{ count: 4, name: 'x' }])
    })

    it('should wait for an in-flight dispatch to finish', () => {
      const store = Store.init({ count: 0, name: 'x' }, counterReducer)
      const countLens = prop<CounterState, 'count'>('count')
      const seen: number[] = []

      store.subscribe((state) => {
        seen.push(state.count)
        if (state.count === 1) {
          store.update(countLens, 100)
          seen.push(store.state.count)
        }
      })

      store.send({ type: 'increment' })

      expect(seen).toEqual([1, 1, 100])
      expect(store.state.count).toBe(100)
    })
  })
})
