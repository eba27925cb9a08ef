import { describe, expect, test } from 'vitest'
import { of } from 'rxjs'
import { observe } from '../../src/infrastructure/database/rxDatabase.js'
import {
  children,
  childrenAsArray,
  filterWhenNotNull,
  filterWhenNull,
} from '../../src/infrastructure/database/snapshotOperators.js'
import { FakeDatabaseReference, snapshot } from '../support/fakeDatabase.js'
import { record } from '../support/record.js'

describe('snapshot operators', () => {
  const empty = snapshot('missing', null)
  const zero = snapshot('zero', 0)
  const filled = snapshot('name', 'ada')

  test('filterWhenNull keeps only empty locations', () => {
    const { events } = record(of(empty, zero, filled).pipe(filterWhenNull()))

    expect(events).toEqual([{ kind: 'N', value: empty }, { kind: 'C' }])
  })

  test('filterWhenNotNull keeps falsy but present values', () => {
    const { events } = record(of(empty, zero, filled).pipe(filterWhenNotNull()))

    expect(events).toEqual([{ kind: 'N', value: zero }, { kind: 'N', value: filled }, { kind: 'C' }])
  })

  test('children flattens every snapshot into its children in order', () => {
    const a = snapshot('a', 1)
    const b = snapshot('b', 2)
    const c = snapshot('c', 3)
    const { events } = record(of(snapshot('list', {}, [a, b]), snapshot('other', {}, [c])).pipe(children()))

    expect(events).toEqual([
      { kind: 'N', value: a },
      { kind: 'N', value: b },
      { kind: 'N', value: c },
      { kind: 'C' },
    ])
  })

  test('childrenAsArray emits one array per snapshot, empty included', () => {
    const a = snapshot('a', 1)
    const b = snapshot('b', 2)
    const { events } = record(of(snapshot('list', {}, [a, b]), snapshot('leaf', 'x')).pipe(childrenAsArray()))

    expect(events).toEqual([{ kind: 'N', value: [a, b] }, { kind: 'N', value: [] }, { kind: 'C' }])
  })

  test('composes with a live listener', () => {
    const ref = new FakeDatabaseReference('users')
    const ada = snapshot('ada', { online: true })
    const { events, subscription } = record(observe(ref, 'value').pipe(filterWhenNotNull(), childrenAsArray()))

    ref.fire('value', snapshot('users', null))
    ref.fire('value', snapshot('users', { ada: { online: true } }, [ada]))
    subscription.unsubscribe()

    expect(events).toEqual([{ kind: 'N', value: [ada] }])
    expect(ref.removedHandles).toEqual([1])
  })
})
