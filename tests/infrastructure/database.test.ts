import { describe, expect, test } from 'vitest'
import type { Observable } from 'rxjs'
import type { DatabaseReference, TransactionUpdate } from '../../src/core/ports/database.js'
import {
  observe,
  observeSingleEvent,
  observeSingleEventWithSiblingKey,
  observeWithSiblingKey,
  onDisconnectRemoveValue,
  onDisconnectSetValue,
  onDisconnectUpdateChildValues,
  removeValue,
  runTransaction,
  setPriority,
  setValue,
  updateChildValues,
} from '../../src/infrastructure/database/rxDatabase.js'
import { FakeDatabaseReference, snapshot } from '../support/fakeDatabase.js'
import { record } from '../support/record.js'

describe('database listeners', () => {
  test('observe forwards each change until disposed and removes the listener once', () => {
    const ref = new FakeDatabaseReference()
    const { events, subscription } = record(observe(ref, 'value'))
    const first = snapshot('root', 1)
    const second = snapshot('root', 2)
    const third = snapshot('root', 3)

    ref.fire('value', first)
    ref.fire('value', second)
    ref.fire('value', third)
    subscription.unsubscribe()
    subscription.unsubscribe()
    // A misbehaving vendor still holding the callback.
    ref.registrations[0]?.onEvent(snapshot('root', 4), null)

    expect(events).toEqual([
      { kind: 'N', value: first },
      { kind: 'N', value: second },
      { kind: 'N', value: third },
    ])
    expect(ref.removedHandles).toEqual([1])
  })

  test('observe registers nothing before subscription', () => {
    const ref = new FakeDatabaseReference()
    const stream$ = observe(ref, 'child_added')

    expect(ref.registrations).toHaveLength(0)
    stream$.subscribe()
    expect(ref.registrations.map((r) => r.eventType)).toEqual(['child_added'])
  })

  test('observe only receives its own event type', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(observe(ref, 'child_removed'))
    const removed = snapshot('gone', 'bye')

    ref.fire('child_added', snapshot('new', 'hi'))
    ref.fire('child_removed', removed)

    expect(events).toEqual([{ kind: 'N', value: removed }])
  })

  test('a revoked listener fails with the vendor error and is removed', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(observe(ref, 'value'))
    const denied = new Error('permission_denied')

    ref.registrations[0]?.onCancel?.(denied)

    expect(events).toEqual([{ kind: 'E', error: denied }])
    expect(ref.removedHandles).toEqual([1])
  })

  test('observeWithSiblingKey pairs each snapshot with the previous sibling key', () => {
    const ref = new FakeDatabaseReference()
    const { events, subscription } = record(observeWithSiblingKey(ref, 'child_moved'))
    const moved = snapshot('b', { rank: 2 })

    ref.fire('child_moved', moved, 'a')
    subscription.unsubscribe()

    expect(events).toEqual([{ kind: 'N', value: { snapshot: moved, previousSiblingKey: 'a' } }])
    expect(ref.removedHandles).toEqual([1])
  })

  test('observeSingleEvent emits the first snapshot and completes', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(observeSingleEvent(ref, 'value'))
    const initial = snapshot('root', { count: 1 })

    ref.onceRegistrations[0]?.onEvent(initial, null)
    ref.onceRegistrations[0]?.onEvent(snapshot('root', { count: 2 }), null)

    expect(events).toEqual([{ kind: 'N', value: initial }, { kind: 'C' }])
    expect(ref.removedHandles).toEqual([])
  })

  test('observeSingleEventWithSiblingKey emits one keyed snapshot', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(observeSingleEventWithSiblingKey(ref, 'child_added'))
    const added = snapshot('c', 3)

    ref.onceRegistrations[0]?.onEvent(added, 'b')

    expect(events).toEqual([
      { kind: 'N', value: { snapshot: added, previousSiblingKey: 'b' } },
      { kind: 'C' },
    ])
  })
})

describe('database writes', () => {
  test('setValue emits the reference then completes', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(setValue(ref, 'x'))

    expect(ref.writes[0]?.method).toBe('setValue')
    expect(ref.writes[0]?.args).toEqual(['x', undefined])

    ref.writes[0]?.complete(null, ref)

    expect(events).toEqual([{ kind: 'N', value: ref }, { kind: 'C' }])
  })

  test('setValue fails with the vendor error only', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(setValue(ref, 'x'))
    const failure = new Error('write rejected')

    ref.writes[0]?.complete(failure, ref)

    expect(events).toEqual([{ kind: 'E', error: failure }])
  })

  test('each subscription performs its own write', () => {
    const ref = new FakeDatabaseReference()
    const write$ = setValue(ref, { name: 'ada' }, 5)

    expect(ref.writes).toHaveLength(0)
    write$.subscribe()
    write$.subscribe()

    expect(ref.writes.map((w) => w.args)).toEqual([
      [{ name: 'ada' }, 5],
      [{ name: 'ada' }, 5],
    ])
  })

  const cases: Array<{
    name: string
    run: (ref: DatabaseReference) => Observable<DatabaseReference>
    method: string
    args: unknown[]
  }> = [
    {
      name: 'updateChildValues',
      run: (ref) => updateChildValues(ref, { 'users/ada/online': true }),
      method: 'updateChildValues',
      args: [{ 'users/ada/online': true }],
    },
    { name: 'removeValue', run: (ref) => removeValue(ref), method: 'removeValue', args: [] },
    { name: 'setPriority', run: (ref) => setPriority(ref, 'high'), method: 'setPriority', args: ['high'] },
    {
      name: 'onDisconnectSetValue',
      run: (ref) => onDisconnectSetValue(ref, 'offline'),
      method: 'onDisconnectSetValue',
      args: ['offline', undefined],
    },
    {
      name: 'onDisconnectUpdateChildValues',
      run: (ref) => onDisconnectUpdateChildValues(ref, { lastSeen: 10 }),
      method: 'onDisconnectUpdateChildValues',
      args: [{ lastSeen: 10 }],
    },
    {
      name: 'onDisconnectRemoveValue',
      run: (ref) => onDisconnectRemoveValue(ref),
      method: 'onDisconnectRemoveValue',
      args: [],
    },
  ]

  test.each(cases)('$name relays the vendor completion', ({ run, method, args }) => {
    const ref = new FakeDatabaseReference()
    const { events } = record(run(ref))

    expect(ref.writes).toHaveLength(1)
    expect(ref.writes[0]?.method).toBe(method)
    expect(ref.writes[0]?.args).toEqual(args)

    ref.writes[0]?.complete(null, ref)
    ref.writes[0]?.complete(null, ref)

    expect(events).toEqual([{ kind: 'N', value: ref }, { kind: 'C' }])
  })
})

describe('runTransaction', () => {
  const increment: TransactionUpdate = (current) => {
    current.value = typeof current.value === 'number' ? current.value + 1 : 1
    return { kind: 'success', data: current }
  }

  test('emits the commit outcome', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(runTransaction(ref, increment, { applyLocally: false }))
    const committed = snapshot('counter', 8)

    expect(ref.transactions[0]?.update).toBe(increment)
    expect(ref.transactions[0]?.applyLocally).toBe(false)

    ref.transactions[0]?.complete(null, true, committed)

    expect(events).toEqual([{ kind: 'N', value: { committed: true, snapshot: committed } }, { kind: 'C' }])
  })

  test('reports an aborted transaction as not committed', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(runTransaction(ref, () => ({ kind: 'abort' })))

    expect(ref.transactions[0]?.applyLocally).toBeUndefined()
    ref.transactions[0]?.complete(null, false, null)

    expect(events).toEqual([{ kind: 'N', value: { committed: false, snapshot: null } }, { kind: 'C' }])
  })

  test('fails with the vendor error', () => {
    const ref = new FakeDatabaseReference()
    const { events } = record(runTransaction(ref, increment))
    const overridden = new Error('set')

    ref.transactions[0]?.complete(overridden, false, null)

    expect(events).toEqual([{ kind: 'E', error: overridden }])
  })
})
