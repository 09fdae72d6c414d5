export type CredentialSource = 'extracted' | 'manual' | 'preconfigured'

/**
 * Upstream session credential. Replaced wholesale on refresh, never mutated.
 */
export interface Credential {
  readonly token: string
  /** Epoch milliseconds */
  readonly acquiredAt: number
  /** Epoch milliseconds, decoded from the token when it is a JWT */
  readonly expiresAt?: number
  readonly source: CredentialSource
}

export interface LoginCredentials {
  email?: string
  password?: string
}

export interface CredentialAcquirer {
  /**
   * Obtain a fresh credential. Rejects with `AuthenticationError`.
   */
  acquire: (login: LoginCredentials) => Promise<Credential>
}
