import { z } from 'zod'
import type { Reply } from '../connector/types.js'
import type { ValidationResult } from './validators.js'

/** What a dialog needs from the turn it runs in. */
export interface DialogTurn {
  readonly text: string
  sendActivity(reply: string | Reply): Promise<void>
}

export type StepInput =
  | { kind: 'none' }
  | { kind: 'result'; value: unknown }

export const promptOptionsSchema = z.object({
  prompt: z.string(),
  retryPrompt: z.string().optional(),
  choices: z.array(z.string()).optional()
})

export type PromptOptions = z.infer<typeof promptOptionsSchema>

export type StepOutcome =
  | { kind: 'advance'; value?: unknown }
  | { kind: 'wait' }
  | { kind: 'prompt'; promptId: string; options: PromptOptions }
  | { kind: 'begin'; dialogId: string; args?: unknown }
  | { kind: 'end'; result: unknown }

export interface StepContext<TTurn extends DialogTurn = DialogTurn> {
  turn: TTurn
  /** Frame-local values, persisted with the stack between turns. */
  values: Record<string, unknown>
  args: unknown
  input: StepInput
  index: number
}

export type WaterfallStep<TTurn extends DialogTurn = DialogTurn> = (step: StepContext<TTurn>) => Promise<StepOutcome>

export type Recognition<T> =
  | { recognized: true; value: T }
  | { recognized: false }

export interface PromptBehavior<T = unknown> {
  recognize(text: string, options: PromptOptions): Recognition<T>
  validate?(value: T): ValidationResult<T>
  render(options: PromptOptions, retry: boolean): Reply
}

export type DialogDefinition<TTurn extends DialogTurn = DialogTurn> =
  | { kind: 'waterfall'; steps: WaterfallStep<TTurn>[] }
  | { kind: 'prompt'; prompt: PromptBehavior }

export function waterfall<TTurn extends DialogTurn>(...steps: WaterfallStep<TTurn>[]): DialogDefinition<TTurn> {
  return { kind: 'waterfall', steps }
}

export const advance = (value?: unknown): StepOutcome =>
  value === undefined ? { kind: 'advance' } : { kind: 'advance', value }

export const wait = (): StepOutcome => ({ kind: 'wait' })

export const prompt = (promptId: string, options: PromptOptions): StepOutcome => ({ kind: 'prompt', promptId, options })

export const begin = (dialogId: string, args?: unknown): StepOutcome => ({ kind: 'begin', dialogId, args })

export const end = (result: unknown = null): StepOutcome => ({ kind: 'end', result })
