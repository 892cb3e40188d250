import { z } from 'zod'
import type { Reply } from '../connector/types.js'
import type { DialogDefinition, DialogTurn, PromptOptions, Recognition } from './types.js'
import type { PromptValidator } from './validators.js'

export const foundChoiceSchema = z.object({
  index: z.number().int().min(0),
  value: z.string()
})

export type FoundChoice = z.infer<typeof foundChoiceSchema>

function promptText(options: PromptOptions, retry: boolean): string {
  return retry && options.retryPrompt ? options.retryPrompt : options.prompt
}

export function recognizeText(text: string): Recognition<string> {
  if (text.length === 0) {
    return { recognized: false }
  }
  return { recognized: true, value: text }
}

/** Matches a 1-based ordinal ("2") or a choice's value, ignoring case and surrounding space. */
export function recognizeChoice(text: string, choices: string[]): Recognition<FoundChoice> {
  const normalized = text.trim().toLowerCase()
  if (normalized.length === 0) {
    return { recognized: false }
  }

  if (/^\d+$/.test(normalized)) {
    const ordinal = Number.parseInt(normalized, 10)
    if (ordinal >= 1 && ordinal <= choices.length) {
      return { recognized: true, value: { index: ordinal - 1, value: choices[ordinal - 1] } }
    }
  }

  const index = choices.findIndex(choice => choice.trim().toLowerCase() === normalized)
  if (index === -1) {
    return { recognized: false }
  }
  return { recognized: true, value: { index, value: choices[index] } }
}

export function textPrompt<TTurn extends DialogTurn = DialogTurn>(validator?: PromptValidator<string>): DialogDefinition<TTurn> {
  return {
    kind: 'prompt',
    prompt: {
      recognize: (text) => recognizeText(text),
      validate: validator,
      render: (options, retry): Reply => ({ kind: 'text', text: promptText(options, retry) })
    }
  }
}

export function choicePrompt<TTurn extends DialogTurn = DialogTurn>(validator?: PromptValidator<FoundChoice>): DialogDefinition<TTurn> {
  return {
    kind: 'prompt',
    prompt: {
      recognize: (text, options) => recognizeChoice(text, options.choices ?? []),
      validate: validator,
      render: (options, retry): Reply => ({
        kind: 'card',
        card: {
          text: promptText(options, retry),
          buttons: (options.choices ?? []).map(choice => ({ title: choice, value: choice }))
        }
      })
    }
  }
}
