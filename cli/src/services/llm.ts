/**
 * LLM access
 *
 * `LlmBackend` is the seam analyzers depend on; `createLlmBackend` builds the
 * production one on the AI SDK, `LlmClient` adds timeouts and error mapping.
 */

import { createOpenAI } from '@ai-sdk/openai'
import { createOpenRouter } from '@openrouter/ai-sdk-provider'
import {
  JSONParseError,
  NoObjectGeneratedError,
  TypeValidationError,
  UnsupportedFunctionalityError,
  generateObject,
  generateText,
  type LanguageModel,
  type ModelMessage,
} from 'ai'
import { ZodError, type z } from 'zod'
import { requireApiKey } from '../utils/api-keys'
import { withTimeout } from '../utils/concurrency'
import { SummarizationFailedError, errorMessage, isTriageError } from '../utils/errors'
import { silentLogger, type Logger } from '../utils/logger'

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

/** Any zod schema producing T, whatever its input type */
export type StructuredSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export interface LlmCallOptions {
  signal?: AbortSignal
}

export interface LlmBackend {
  complete(messages: ChatMessage[], options?: LlmCallOptions): Promise<string>
  /** Present when the backend can return schema-shaped JSON */
  completeStructured?<T>(messages: ChatMessage[], schema: StructuredSchema<T>, options?: LlmCallOptions): Promise<T>
}

export interface LlmSettings {
  apiKey?: string
  model: string
  /** OpenAI-compatible endpoint; OpenRouter when absent */
  llmBaseUrl?: string
}

function splitMessages(messages: ChatMessage[]): { system: string | undefined; messages: ModelMessage[] } {
  const system = messages
    .filter(m => m.role === 'system')
    .map(m => m.content)
    .join('\n\n')

  const conversation: ModelMessage[] = []
  for (const m of messages) {
    if (m.role === 'user') conversation.push({ role: 'user', content: m.content })
    else if (m.role === 'assistant') conversation.push({ role: 'assistant', content: m.content })
  }

  return { system: system || undefined, messages: conversation }
}

function resolveModel(settings: LlmSettings): LanguageModel {
  const apiKey = requireApiKey(settings.apiKey)

  if (settings.llmBaseUrl) {
    const provider = createOpenAI({ baseURL: settings.llmBaseUrl, apiKey })
    return provider.chat(settings.model)
  }

  const openrouter = createOpenRouter({ apiKey })
  return openrouter(settings.model)
}

/**
 * Production backend on the AI SDK
 */
export function createLlmBackend(settings: LlmSettings): LlmBackend {
  // Resolved on first use so commands that never call the LLM need no key
  let model: LanguageModel | null = null
  const getModel = (): LanguageModel => {
    model ??= resolveModel(settings)
    return model
  }

  return {
    async complete(messages, options = {}) {
      const { system, messages: conversation } = splitMessages(messages)
      const result = await generateText({
        model: getModel(),
        system,
        messages: conversation,
        abortSignal: options.signal,
      })
      return result.text.trim()
    },

    async completeStructured<T>(messages: ChatMessage[], schema: StructuredSchema<T>, options: LlmCallOptions = {}) {
      const { system, messages: conversation } = splitMessages(messages)
      const result = await generateObject({
        model: getModel(),
        schema,
        system,
        messages: conversation,
        abortSignal: options.signal,
      })
      return schema.parse(result.object)
    },
  }
}

/**
 * The reply did not fit the schema, or the model has no structured mode;
 * the call itself went through
 */
export function isSchemaMismatch(err: unknown): boolean {
  return (
    err instanceof ZodError ||
    NoObjectGeneratedError.isInstance(err) ||
    TypeValidationError.isInstance(err) ||
    JSONParseError.isInstance(err) ||
    UnsupportedFunctionalityError.isInstance(err)
  )
}

export interface LlmClientOptions {
  timeoutMs: number
  logger?: Logger
}

/**
 * Timeout and error mapping around an `LlmBackend`.
 * Every failure surfaces as SummarizationFailed.
 */
export class LlmClient {
  private readonly logger: Logger

  constructor(
    private readonly backend: LlmBackend,
    private readonly options: LlmClientOptions
  ) {
    this.logger = options.logger ?? silentLogger
  }

  get supportsStructured(): boolean {
    return this.backend.completeStructured !== undefined
  }

  /**
   * Free-text completion; empty replies are failures
   */
  async text(messages: ChatMessage[], purpose: string): Promise<string> {
    let reply: string
    try {
      reply = await withTimeout(
        signal => this.backend.complete(messages, { signal }),
        this.options.timeoutMs,
        () => new SummarizationFailedError(`${purpose}: LLM timed out after ${this.options.timeoutMs}ms`)
      )
    } catch (err) {
      if (isTriageError(err)) throw err
      throw new SummarizationFailedError(`${purpose}: ${errorMessage(err)}`, { cause: err })
    }

    if (!reply.trim()) {
      throw new SummarizationFailedError(`${purpose}: empty reply`)
    }
    return reply
  }

  /**
   * Schema-shaped completion. Returns null when the backend has no structured
   * mode or its reply does not validate, so callers can fall back to text.
   * Any other failure is SummarizationFailed.
   */
  async structured<T>(messages: ChatMessage[], schema: StructuredSchema<T>, purpose: string): Promise<T | null> {
    const completeStructured = this.backend.completeStructured?.bind(this.backend)
    if (!completeStructured) return null

    try {
      return await withTimeout(
        signal => completeStructured(messages, schema, { signal }),
        this.options.timeoutMs,
        () => new SummarizationFailedError(`${purpose}: LLM timed out after ${this.options.timeoutMs}ms`)
      )
    } catch (err) {
      if (isTriageError(err)) throw err
      if (!isSchemaMismatch(err)) {
        throw new SummarizationFailedError(`${purpose}: ${errorMessage(err)}`, { cause: err })
      }
      this.logger.debug(errorMessage(err), `${purpose}: structured output unavailable, using text`)
      return null
    }
  }
}
