/**
 * Anthropic Extraction Service
 *
 * ExtractionService adapter over the Anthropic Messages API. One message per
 * call: the schema's system prompt plus the page content. The reply's text is
 * parsed as JSON; schema conformance is checked by the caller.
 */

import Anthropic from '@anthropic-ai/sdk'
import { ExtractionServiceError, errorMessageOf } from '../errors.js'
import type { ExtractionService, PromptSchemaId } from '../types.js'
import { systemPromptFor } from './prompts.js'

export interface CompletionRequest {
  model: string
  max_tokens: number
  temperature: number
  system: string
  messages: Array<{ role: 'user'; content: string }>
}

export interface CompletionResponse {
  content: ReadonlyArray<{ type: string; text?: string }>
}

/** The slice of the Anthropic client this adapter calls. */
export interface MessagesClient {
  messages: {
    create(body: CompletionRequest, options?: { timeout?: number }): Promise<CompletionResponse>
  }
}

export interface AnthropicExtractionServiceOptions {
  apiKey: string
  model: string
  maxTokens: number
  timeoutMs: number
  /** Injected for tests; defaults to a client built from `apiKey` */
  client?: MessagesClient
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/

/**
 * Pull the JSON object out of a model reply, tolerating code fences and
 * surrounding prose.
 *
 * @throws ExtractionServiceError of kind 'malformed'
 */
export function parseJsonReply(text: string): unknown {
  const fenced = FENCED_BLOCK.exec(text)
  const body = fenced ? fenced[1] : text
  const start = body.indexOf('{')
  const end = body.lastIndexOf('}')

  if (start === -1 || end < start) {
    throw new ExtractionServiceError('malformed', 'Reply contains no JSON object')
  }

  try {
    return JSON.parse(body.slice(start, end + 1))
  } catch (error) {
    throw new ExtractionServiceError('malformed', `Reply is not valid JSON: ${errorMessageOf(error)}`, { cause: error })
  }
}

function statusCodeOf(error: unknown): number | undefined {
  return error instanceof Anthropic.APIError ? error.status : undefined
}

export class AnthropicExtractionService implements ExtractionService {
  private readonly client: MessagesClient

  constructor(private readonly options: AnthropicExtractionServiceOptions) {
    // Retries are owned by the pipeline's retry policy
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 })
  }

  async infer(schema: PromptSchemaId, content: string): Promise<unknown> {
    const response = await this.send({
      model: this.options.model,
      max_tokens: this.options.maxTokens,
      temperature: 0,
      system: systemPromptFor(schema),
      messages: [{ role: 'user', content }],
    })

    const text = response.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')

    return parseJsonReply(text)
  }

  async healthCheck(): Promise<void> {
    await this.send({
      model: this.options.model,
      max_tokens: 1,
      temperature: 0,
      system: 'Reply with OK.',
      messages: [{ role: 'user', content: 'ping' }],
    })
  }

  private async send(request: CompletionRequest): Promise<CompletionResponse> {
    try {
      return await this.client.messages.create(request, { timeout: this.options.timeoutMs })
    } catch (error) {
      throw new ExtractionServiceError('unavailable', `Anthropic request failed: ${errorMessageOf(error)}`, {
        statusCode: statusCodeOf(error),
        cause: error,
      })
    }
  }
}
