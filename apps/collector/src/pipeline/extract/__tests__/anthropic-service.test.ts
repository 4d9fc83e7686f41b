import { describe, expect, it, vi } from 'vitest'
import { ExtractionServiceError } from '../../errors.js'
import { AnthropicExtractionService, parseJsonReply } from '../anthropic-service.js'
import type { CompletionRequest, CompletionResponse, MessagesClient } from '../anthropic-service.js'
import { systemPromptFor } from '../prompts.js'

function stubClient(reply: CompletionResponse | Error) {
  const create = vi.fn(async (_body: CompletionRequest, _options?: { timeout?: number }) => {
    if (reply instanceof Error) throw reply
    return reply
  })
  const client: MessagesClient = { messages: { create } }
  return { client, create }
}

function service(client: MessagesClient) {
  return new AnthropicExtractionService({
    apiKey: 'test-secret',
    model: 'test-model',
    maxTokens: 2048,
    timeoutMs: 15_000,
    client,
  })
}

describe('parseJsonReply', () => {
  it('parses a bare JSON object', () => {
    expect(parseJsonReply('{"label": "product"}')).toEqual({ label: 'product' })
  })

  it('parses a fenced block surrounded by prose', () => {
    const reply = 'Here is what I found:\n```json\n{"products": [{"product_name": "Harmony Sofa"}]}\n```\nLet me know.'
    expect(parseJsonReply(reply)).toEqual({ products: [{ product_name: 'Harmony Sofa' }] })
  })

  it('rejects replies without a JSON object', () => {
    expect(() => parseJsonReply('No products on this page.')).toThrow(ExtractionServiceError)
    expect(() => parseJsonReply('No products on this page.')).toThrow('Reply contains no JSON object')
  })

  it('rejects truncated JSON as malformed', () => {
    try {
      parseJsonReply('{"products": [{"product_name": "Harmony"} }')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ExtractionServiceError)
      expect(error).toMatchObject({ kind: 'malformed', code: 'EXTRACTION_SERVICE_ERROR' })
    }
  })
})

describe('AnthropicExtractionService', () => {
  it('sends the schema prompt with the page content and parses the reply', async () => {
    const { client, create } = stubClient({
      content: [{ type: 'text', text: '{"promotions": [], "confidence": 0.4}' }],
    })

    const result = await service(client).infer('promotion', 'Spring Sale 20% off')

    expect(result).toEqual({ promotions: [], confidence: 0.4 })
    expect(create).toHaveBeenCalledWith(
      {
        model: 'test-model',
        max_tokens: 2048,
        temperature: 0,
        system: systemPromptFor('promotion'),
        messages: [{ role: 'user', content: 'Spring Sale 20% off' }],
      },
      { timeout: 15_000 }
    )
  })

  it('joins text blocks and ignores other block types', async () => {
    const { client } = stubClient({
      content: [
        { type: 'text', text: '{"label": ' },
        { type: 'tool_use' },
        { type: 'text', text: '"other"}' },
      ],
    })

    await expect(service(client).infer('page-label', 'URL: https://www.westelm.com/help')).resolves.toEqual({
      label: 'other',
    })
  })

  it('reports request failures as unavailable', async () => {
    const { client } = stubClient(new Error('socket hang up'))

    await expect(service(client).infer('product', 'x')).rejects.toMatchObject({
      kind: 'unavailable',
      message: 'Anthropic request failed: socket hang up',
    })
  })

  it('reports a non-JSON reply as malformed', async () => {
    const { client } = stubClient({ content: [{ type: 'text', text: 'I cannot help with that.' }] })

    await expect(service(client).infer('product', 'x')).rejects.toMatchObject({ kind: 'malformed' })
  })

  it('health-checks with a minimal request', async () => {
    const { client, create } = stubClient({ content: [{ type: 'text', text: 'OK' }] })

    await service(client).healthCheck()

    expect(create).toHaveBeenCalledTimes(1)
    expect(create.mock.calls[0][0]).toMatchObject({ max_tokens: 1, model: 'test-model' })
  })

  it('fails the health check when the API is unreachable', async () => {
    const { client } = stubClient(new Error('ECONNREFUSED'))

    await expect(service(client).healthCheck()).rejects.toBeInstanceOf(ExtractionServiceError)
  })
})
