import { filter, from, map, mergeMap, type OperatorFunction } from 'rxjs'
import type { DataSnapshot } from '../../core/ports/database.js'

export function isNullSnapshot(snapshot: DataSnapshot): boolean {
  return snapshot.value === null
}

/** Keep only snapshots of empty locations. */
export function filterWhenNull<S extends DataSnapshot>(): OperatorFunction<S, S> {
  return filter((snapshot: S) => isNullSnapshot(snapshot))
}

/** Keep only snapshots that hold data. */
export function filterWhenNotNull<S extends DataSnapshot>(): OperatorFunction<S, S> {
  return filter((snapshot: S) => !isNullSnapshot(snapshot))
}

/** Emit each child of every incoming snapshot, in vendor order. */
export function children(): OperatorFunction<DataSnapshot, DataSnapshot> {
  return mergeMap((snapshot: DataSnapshot) => from(Array.from(snapshot.children)))
}

/** Emit the children of every incoming snapshot as one array. */
export function childrenAsArray(): OperatorFunction<DataSnapshot, DataSnapshot[]> {
  return map((snapshot: DataSnapshot) => Array.from(snapshot.children))
}
