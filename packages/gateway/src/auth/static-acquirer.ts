import type { Credential, CredentialAcquirer, CredentialSource } from './types'
import { AuthenticationError } from '../utils/errors'
import { createCredential } from './jwt'

/**
 * Acquirer for deployments that hand the gateway a token directly
 */
export class StaticCredentialAcquirer implements CredentialAcquirer {
  constructor(
    private readonly token: string | undefined,
    private readonly source: CredentialSource = 'manual',
  ) {}

  async acquire(): Promise<Credential> {
    if (!this.token) {
      throw new AuthenticationError('missing_credentials', 'No static token configured')
    }
    return createCredential(this.token, this.source)
  }
}
