export interface GenerateOptions {
  temperature?: number
  maxTokens?: number
}

export interface LLMProvider {
  name: string
  isAvailable(): Promise<boolean>
  generateText(systemPrompt: string, userPrompt: string, options?: GenerateOptions): Promise<string>
}
