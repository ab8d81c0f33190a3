import Anthropic, { APIConnectionTimeoutError } from '@anthropic-ai/sdk'
import type { Config } from '../core/config.js'
import { GenerationTimeoutError, GenerationUnavailableError } from '../core/errors.js'
import type { GenerateOptions, Generator } from '../core/types.js'
import { logger } from '../utils/logger.js'

const log = logger.child('anthropic')

export type GeneratorConfig = Pick<Config, 'anthropicApiKey' | 'generationModel' | 'generationMaxTokens' | 'generationTimeout'>

export class AnthropicGenerator implements Generator {
  private client: Anthropic | null = null

  constructor(
    private config: GeneratorConfig,
    client?: Anthropic,
  ) {
    if (client) {
      this.client = client
    } else if (config.anthropicApiKey) {
      this.client = new Anthropic({ apiKey: config.anthropicApiKey, timeout: config.generationTimeout, maxRetries: 0 })
    }
  }

  get enabled(): boolean {
    return this.client !== null
  }

  async generate(prompt: string, context: string | null, options: GenerateOptions = {}): Promise<string> {
    if (!this.client) {
      throw new GenerationUnavailableError('Generation needs ANTHROPIC_API_KEY to be set')
    }

    let response: Anthropic.Message
    try {
      response = await this.client.messages.create(
        {
          model: this.config.generationModel,
          max_tokens: options.maxTokens ?? this.config.generationMaxTokens,
          temperature: options.temperature,
          system: context ? `Use the following context passages when answering.\n\n${context}` : undefined,
          messages: [{ role: 'user', content: prompt }],
        },
        { timeout: this.config.generationTimeout, maxRetries: 0, signal: options.signal },
      )
    } catch (err) {
      if (err instanceof APIConnectionTimeoutError) {
        throw new GenerationTimeoutError(`Generation timed out after ${this.config.generationTimeout}ms`, err)
      }
      const message = err instanceof Error ? err.message : String(err)
      log.warn(`Generation request failed: ${message}`)
      throw new GenerationUnavailableError(`Generation failed: ${message}`, err)
    }

    const text = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('')
      .trim()
    if (!text) throw new GenerationUnavailableError('Generation returned no text')
    return text
  }
}
