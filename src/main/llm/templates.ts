export const DRAFT_SYSTEM_PROMPT = '너는 대학 행정 회의록 전문 서기야.'

export const DRAFT_TEMPERATURE = 0.3

export interface DraftContext {
  topic: string
  keywords: string
}

export function buildDraftPrompt(context: DraftContext): { systemPrompt: string; userPrompt: string } {
  const userPrompt = [
    '다음 주제와 키워드로 교수학습공동체 회의록의 회의 내용을 작성해줘.',
    '',
    `주제: ${context.topic}`,
    `키워드: ${context.keywords}`,
    '',
    '[작성 조건]',
    '1. 번호 없이 하이픈(-) 사용.',
    "2. '~함', '~음' 등 명사형 개조식.",
    '3. 일시/장소/참석자 제외.',
    '4. 10줄 내외.',
    '5. 굵은 글씨 등 마크다운 강조 표시 사용 금지.'
  ].join('\n')

  return { systemPrompt: DRAFT_SYSTEM_PROMPT, userPrompt }
}
