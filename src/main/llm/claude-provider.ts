import Anthropic from '@anthropic-ai/sdk'
import type { GenerateOptions, LLMProvider } from './provider'

const DEFAULT_MAX_TOKENS = 1024

export class ClaudeProvider implements LLMProvider {
  name = 'Claude'
  private client: Anthropic

  constructor(
    private apiKey: string,
    private model: string
  ) {
    this.client = new Anthropic({ apiKey })
  }

  async isAvailable(): Promise<boolean> {
    return this.apiKey.trim().length > 0
  }

  async generateText(systemPrompt: string, userPrompt: string, options: GenerateOptions = {}): Promise<string> {
    const stream = this.client.messages.stream({
      model: this.model,
      max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature,
      system: systemPrompt,
      messages: [{ role: 'user', content: userPrompt }]
    })
    return stream.finalText()
  }
}
