import type { LLMProvider } from './provider'
import { ClaudeProvider } from './claude-provider'
import { OllamaProvider } from './ollama-provider'
import { buildDraftPrompt, DRAFT_TEMPERATURE } from './templates'
import { getCredential } from '../security/credentials'
import { getAppSettings } from '../database/repositories/settings.repo'

export const DRAFT_ERROR_MARKER = '[AI 초안 오류]'

export function getProvider(): LLMProvider {
  const settings = getAppSettings()

  if (settings.llmProvider === 'ollama') {
    return new OllamaProvider(settings.ollamaModel, settings.ollamaHost)
  }

  const apiKey = getCredential('claudeApiKey')
  if (!apiKey) {
    throw new Error('Claude API key not configured. Set ANTHROPIC_API_KEY or store it in settings.')
  }
  return new ClaudeProvider(apiKey, settings.claudeModel)
}

export function cleanDraft(text: string): string {
  return text.replace(/\*\*/g, '').trim()
}

/**
 * Draft the meeting-content section from a topic and keywords.
 * Never throws: failures come back as text starting with the error marker.
 */
export async function draftMinutes(
  topic: string,
  keywords: string,
  resolveProvider: () => LLMProvider = getProvider
): Promise<string> {
  const { systemPrompt, userPrompt } = buildDraftPrompt({ topic, keywords })

  try {
    const provider = resolveProvider()
    if (!(await provider.isAvailable())) {
      console.warn(`[Draft] ${provider.name} is not available`)
      return `${DRAFT_ERROR_MARKER} ${provider.name} is not available`
    }
    console.log(`[Draft] Generating with ${provider.name}`)
    const text = await provider.generateText(systemPrompt, userPrompt, { temperature: DRAFT_TEMPERATURE })
    return cleanDraft(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    console.error('[Draft] Generation failed:', message)
    return `${DRAFT_ERROR_MARKER} ${message}`
  }
}
