import { z } from 'zod'
import { InvalidConfigurationError } from '../errors.js'
import { summarizeZodError } from '../utils/zod.js'

/**
 * Generation parameters a caller may supply. Every field is optional; missing fields
 * fall back to provider defaults, then to {@link DEFAULT_GENERATION}.
 *
 * @example
 * ```typescript
 * const init: GenerationConfigInit = {
 *   temperature: 0.2,
 *   maxTokens: 512,
 *   stopSequences: ['END'],
 * }
 * ```
 */
export interface GenerationConfigInit {
  /**
   * Sampling temperature in [0, 2].
   */
  temperature?: number | undefined

  /**
   * Upper bound on generated tokens. Positive integer.
   */
  maxTokens?: number | undefined

  /**
   * Nucleus sampling mass in (0, 1].
   */
  topP?: number | undefined

  /**
   * Top-k sampling cutoff. Positive integer; providers without top-k ignore it.
   */
  topK?: number | undefined

  /**
   * Instruction text sent the provider's way (system message or system field).
   */
  systemPrompt?: string | undefined

  /**
   * Strings that end generation when produced.
   */
  stopSequences?: readonly string[] | undefined

  /**
   * Frequency penalty in [-2, 2]. Only forwarded when non-zero.
   */
  frequencyPenalty?: number | undefined

  /**
   * Presence penalty in [-2, 2]. Only forwarded when non-zero.
   */
  presencePenalty?: number | undefined
}

export type GenerationField = keyof GenerationConfigInit

/**
 * Plain snapshot of a resolved configuration, as returned by {@link GenerationConfig.toJSON}.
 */
export interface GenerationSettings {
  temperature: number
  maxTokens: number
  topP: number
  topK?: number
  systemPrompt?: string
  stopSequences: string[]
  frequencyPenalty: number
  presencePenalty: number
}

/**
 * Library-wide fallbacks, used when neither the caller nor the provider preset sets a field.
 */
export const DEFAULT_GENERATION = Object.freeze({
  temperature: 0.7,
  maxTokens: 4096,
  topP: 0.9,
  stopSequences: Object.freeze<string[]>([]),
  frequencyPenalty: 0,
  presencePenalty: 0,
})

const GENERATION_FIELDS: readonly GenerationField[] = [
  'temperature',
  'maxTokens',
  'topP',
  'topK',
  'systemPrompt',
  'stopSequences',
  'frequencyPenalty',
  'presencePenalty',
]

const GenerationConfigSchema = z.strictObject({
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  topP: z.number().gt(0).max(1).optional(),
  topK: z.number().int().positive().optional(),
  systemPrompt: z.string().optional(),
  stopSequences: z.array(z.string()).optional(),
  frequencyPenalty: z.number().min(-2).max(2).optional(),
  presencePenalty: z.number().min(-2).max(2).optional(),
})

type ParsedInit = z.infer<typeof GenerationConfigSchema>

function parseInit(init: GenerationConfigInit): ParsedInit {
  const parsed = GenerationConfigSchema.safeParse(init)
  if (parsed.success) {
    return parsed.data
  }

  const issue = summarizeZodError(parsed.error)
  const field = issue.field ?? 'config'
  throw new InvalidConfigurationError(field, `Invalid generation config field '${field}': ${issue.message}`, {
    cause: parsed.error,
  })
}

/**
 * Immutable, validated bundle of generation parameters.
 *
 * Construction fails with {@link InvalidConfigurationError} naming the offending field.
 * Neither the client nor the adapters ever mutate an instance; derive a new one with
 * {@link GenerationConfig.with}.
 */
export class GenerationConfig {
  readonly temperature: number
  readonly maxTokens: number
  readonly topP: number
  readonly topK: number | undefined
  readonly systemPrompt: string | undefined
  readonly stopSequences: readonly string[]
  readonly frequencyPenalty: number
  readonly presencePenalty: number

  private readonly _explicit: ReadonlySet<GenerationField>

  constructor(init: GenerationConfigInit = {}) {
    const parsed = parseInit(init)

    this.temperature = parsed.temperature ?? DEFAULT_GENERATION.temperature
    this.maxTokens = parsed.maxTokens ?? DEFAULT_GENERATION.maxTokens
    this.topP = parsed.topP ?? DEFAULT_GENERATION.topP
    this.topK = parsed.topK
    this.systemPrompt = parsed.systemPrompt
    this.stopSequences = Object.freeze([...(parsed.stopSequences ?? DEFAULT_GENERATION.stopSequences)])
    this.frequencyPenalty = parsed.frequencyPenalty ?? DEFAULT_GENERATION.frequencyPenalty
    this.presencePenalty = parsed.presencePenalty ?? DEFAULT_GENERATION.presencePenalty
    this._explicit = new Set(GENERATION_FIELDS.filter((field) => parsed[field] !== undefined))

    Object.freeze(this)
  }

  /**
   * Resolves the configuration for one call: explicit field, else provider default,
   * else library default.
   *
   * @param input - What the caller passed, if anything
   * @param providerDefaults - Defaults of the provider preset
   */
  static resolve(
    input: GenerationConfig | GenerationConfigInit | undefined,
    providerDefaults: GenerationConfigInit = {}
  ): GenerationConfig {
    const explicit = input instanceof GenerationConfig ? input.explicitFields() : parseInit(input ?? {})
    const defaults = parseInit(providerDefaults)
    return new GenerationConfig({ ...defaults, ...definedOnly(explicit) })
  }

  /**
   * Whether the caller supplied `field` at construction.
   */
  isExplicit(field: GenerationField): boolean {
    return this._explicit.has(field)
  }

  /**
   * The fields supplied at construction, with their values.
   */
  explicitFields(): GenerationConfigInit {
    const fields: GenerationConfigInit = {}
    for (const field of this._explicit) {
      Object.assign(fields, { [field]: this[field] })
    }
    return fields
  }

  /**
   * Returns a new validated config with `overrides` applied on top of this one's explicit fields.
   */
  with(overrides: GenerationConfigInit): GenerationConfig {
    return new GenerationConfig({ ...this.explicitFields(), ...definedOnly(overrides) })
  }

  toJSON(): GenerationSettings {
    return {
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      topP: this.topP,
      ...(this.topK !== undefined ? { topK: this.topK } : {}),
      ...(this.systemPrompt !== undefined ? { systemPrompt: this.systemPrompt } : {}),
      stopSequences: [...this.stopSequences],
      frequencyPenalty: this.frequencyPenalty,
      presencePenalty: this.presencePenalty,
    }
  }
}

function definedOnly(init: GenerationConfigInit): GenerationConfigInit {
  const fields: GenerationConfigInit = {}
  for (const field of GENERATION_FIELDS) {
    if (init[field] !== undefined) {
      Object.assign(fields, { [field]: init[field] })
    }
  }
  return fields
}
