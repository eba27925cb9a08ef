import type { Observable } from 'rxjs'
import { fromSingleShot } from '../../core/streams/callbackStream.js'
import type { AuthCredential, User } from '../../core/ports/auth.js'

/** Refresh the user's profile from the backend; emits the same user object. */
export function reloadUser(user: User): Observable<User> {
  return fromSingleShot<User>((done) => user.reload((error) => done(error, user)))
}

/** Attach another provider's credential to the user. */
export function linkUser(user: User, credential: AuthCredential): Observable<User | null> {
  return fromSingleShot<User | null>((done) => user.link(credential, done))
}
