/**
 * Core Layer - Ports
 *
 * Authentication surface consumed by the auth and user adapters.
 */

export interface AuthCredential {
  readonly providerId: string
}

export type UserCallback = (error: Error | null, user: User | null) => void

export interface User {
  readonly uid: string
  readonly isAnonymous: boolean
  readonly email: string | null

  reload(onComplete: (error: Error | null) => void): void
  link(credential: AuthCredential, onComplete: UserCallback): void
}

/** Opaque token identifying a registered auth state listener. */
export type AuthStateListenerHandle = object

export type AuthStateListener = (auth: Auth, user: User | null) => void

export interface Auth {
  readonly currentUser: User | null

  /**
   * Invoked when registered, when the current user changes and when the
   * current user's access token changes.
   */
  addAuthStateDidChangeListener(listener: AuthStateListener): AuthStateListenerHandle
  removeAuthStateDidChangeListener(handle: AuthStateListenerHandle): void

  signInWithEmail(email: string, password: string, onComplete: UserCallback): void
  signInAnonymously(onComplete: UserCallback): void
  signInWithCredential(credential: AuthCredential, onComplete: UserCallback): void
  signInWithCustomToken(token: string, onComplete: UserCallback): void
  createUserWithEmail(email: string, password: string, onComplete: UserCallback): void
}
