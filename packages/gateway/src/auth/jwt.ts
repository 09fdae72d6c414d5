import type { Credential, CredentialSource } from './types'
import { Buffer } from 'node:buffer'
import { z } from 'zod'

const payloadSchema = z.object({
  exp: z.number().optional(),
}).passthrough()

/**
 * Decode the `exp` claim of a JWT without verifying it. Returns epoch milliseconds,
 * or undefined for tokens that are not JWTs or carry no expiry.
 */
export function decodeJwtExpiry(token: string): number | undefined {
  const parts = token.split('.')
  if (parts.length !== 3 || !parts[1]) {
    return undefined
  }

  try {
    const json: unknown = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf-8'))
    const parsed = payloadSchema.safeParse(json)
    if (!parsed.success || parsed.data.exp === undefined) {
      return undefined
    }
    return parsed.data.exp * 1000
  }
  catch {
    return undefined
  }
}

export function createCredential(token: string, source: CredentialSource, now: number = Date.now()): Credential {
  const expiresAt = decodeJwtExpiry(token)
  return expiresAt !== undefined
    ? { token, acquiredAt: now, expiresAt, source }
    : { token, acquiredAt: now, source }
}
