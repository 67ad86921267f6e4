import type { MinutesRecord } from '../../shared/types/meeting'

export type SaveStep = 'input' | 'check_duplicate' | 'confirm' | 'success'
export type SaveChoice = 'overwrite' | 'append' | 'cancel'
export type SaveOutcome = 'overwritten' | 'appended'

export interface SaveWizardState {
  step: SaveStep
  pending: MinutesRecord | null
  outcome: SaveOutcome | null
  message: string | null
}

export type SaveWizardEvent =
  | { type: 'rejected'; message: string }
  | { type: 'submitted'; record: MinutesRecord; duplicate: boolean }
  | { type: 'cancelled' }
  | { type: 'written'; outcome: SaveOutcome }
  | { type: 'write_failed'; message: string }
  | { type: 'finished' }

export const INITIAL_SAVE_STATE: SaveWizardState = {
  step: 'input',
  pending: null,
  outcome: null,
  message: null
}

const CHOICES: Record<SaveStep, SaveChoice[]> = {
  input: [],
  check_duplicate: ['overwrite', 'append', 'cancel'],
  confirm: ['append', 'cancel'],
  success: []
}

export function allowedChoices(step: SaveStep): SaveChoice[] {
  return CHOICES[step]
}

function isAwaitingChoice(step: SaveStep): boolean {
  return step === 'check_duplicate' || step === 'confirm'
}

/** Events that do not apply to the current step leave the state as it is. */
export function transition(state: SaveWizardState, event: SaveWizardEvent): SaveWizardState {
  switch (event.type) {
    case 'rejected':
      if (state.step !== 'input') return state
      return { ...INITIAL_SAVE_STATE, message: event.message }

    case 'submitted':
      if (state.step !== 'input') return state
      return {
        step: event.duplicate ? 'check_duplicate' : 'confirm',
        pending: event.record,
        outcome: null,
        message: null
      }

    case 'cancelled':
      if (!isAwaitingChoice(state.step)) return state
      return INITIAL_SAVE_STATE

    case 'written':
      if (!isAwaitingChoice(state.step)) return state
      if (event.outcome === 'overwritten' && state.step !== 'check_duplicate') return state
      return { step: 'success', pending: null, outcome: event.outcome, message: null }

    case 'write_failed':
      if (!isAwaitingChoice(state.step)) return state
      return { ...state, message: event.message }

    case 'finished':
      if (state.step !== 'success') return state
      return INITIAL_SAVE_STATE
  }
}
