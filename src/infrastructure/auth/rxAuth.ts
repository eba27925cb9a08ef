/**
 * Infrastructure Layer - Auth Adapters
 */

import type { Observable } from 'rxjs'
import { fromListener, fromSingleShot } from '../../core/streams/callbackStream.js'
import type { Auth, AuthCredential, AuthStateListenerHandle, User } from '../../core/ports/auth.js'

export type AuthState = {
  auth: Auth
  user: User | null
}

/**
 * Auth state changes. Emits on registration, whenever the current user
 * changes and whenever the current user's access token changes.
 */
export function authStateChanges(auth: Auth): Observable<AuthState> {
  return fromListener<AuthState, AuthStateListenerHandle>(
    (emit) => auth.addAuthStateDidChangeListener((source, user) => emit({ auth: source, user })),
    (handle) => auth.removeAuthStateDidChangeListener(handle)
  )
}

export function signInWithEmail(auth: Auth, email: string, password: string): Observable<User | null> {
  return fromSingleShot<User | null>((done) => auth.signInWithEmail(email, password, done))
}

export function signInAnonymously(auth: Auth): Observable<User | null> {
  return fromSingleShot<User | null>((done) => auth.signInAnonymously(done))
}

/** Sign in with a federated provider credential. */
export function signInWithCredential(auth: Auth, credential: AuthCredential): Observable<User | null> {
  return fromSingleShot<User | null>((done) => auth.signInWithCredential(credential, done))
}

export function signInWithCustomToken(auth: Auth, token: string): Observable<User | null> {
  return fromSingleShot<User | null>((done) => auth.signInWithCustomToken(token, done))
}

/** Create a user account and, on success, sign it in. */
export function createUserWithEmail(auth: Auth, email: string, password: string): Observable<User | null> {
  return fromSingleShot<User | null>((done) => auth.createUserWithEmail(email, password, done))
}
