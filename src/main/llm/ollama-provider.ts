import type { GenerateOptions, LLMProvider } from './provider'

interface OllamaGenerateResponse {
  response?: string
  error?: string
}

export class OllamaProvider implements LLMProvider {
  name = 'Ollama'

  constructor(
    private model: string,
    private host: string
  ) {}

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.host}/api/tags`)
      return response.ok
    } catch {
      return false
    }
  }

  async generateText(systemPrompt: string, userPrompt: string, options: GenerateOptions = {}): Promise<string> {
    const response = await fetch(`${this.host}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        system: systemPrompt,
        prompt: userPrompt,
        stream: false,
        options: { temperature: options.temperature }
      })
    })

    if (!response.ok) {
      throw new Error(`Ollama request failed: ${response.status} ${response.statusText}`)
    }

    const body = (await response.json()) as OllamaGenerateResponse
    if (body.error) throw new Error(`Ollama error: ${body.error}`)

    return body.response ?? ''
  }
}
