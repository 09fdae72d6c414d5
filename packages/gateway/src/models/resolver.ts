import type { ModelEntry } from '../types/openai'
import { ConfigurationError } from '../utils/errors'
import models from './models.json'

export const CANONICAL_MODELS: readonly string[] = models.canonical
export const DEFAULT_MODEL = models.default

/**
 * Maps whatever model name a caller sends onto one upstream model. Known names pass
 * through unchanged (case-sensitive); anything else falls back to the default.
 */
export class ModelResolver {
  private readonly known: ReadonlySet<string>
  private readonly createdAt: number

  constructor(
    private readonly defaultModel: string = DEFAULT_MODEL,
    canonical: readonly string[] = CANONICAL_MODELS,
  ) {
    this.known = new Set(canonical)
    if (!this.known.has(defaultModel)) {
      throw new ConfigurationError(`Default model "${defaultModel}" is not one of: ${canonical.join(', ')}`)
    }
    this.createdAt = Math.floor(Date.now() / 1000)
  }

  resolve(name: string | undefined | null): string {
    if (name && this.known.has(name)) {
      return name
    }
    return this.defaultModel
  }

  getDefault(): string {
    return this.defaultModel
  }

  list(): ModelEntry[] {
    return Array.from(this.known, id => ({
      id,
      object: 'model' as const,
      created: this.createdAt,
      owned_by: 'qwen',
    }))
  }
}
