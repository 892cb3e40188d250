import { createNoopLogger, type Logger } from '../logger.js'
import type { DialogRegistry } from './registry.js'
import type { DialogFrame, DialogStack } from './stack.js'
import {
  promptOptionsSchema,
  type DialogTurn,
  type PromptBehavior,
  type PromptOptions,
  type StepInput,
  type WaterfallStep
} from './types.js'
import { accepted } from './validators.js'

export type DialogStatus = 'idle' | 'active' | 'awaiting_input'

export interface DialogTurnResult {
  status: 'empty' | 'waiting' | 'complete' | 'cancelled'
  result?: unknown
}

export interface DialogContextDeps<TTurn extends DialogTurn> {
  registry: DialogRegistry<TTurn>
  stack: DialogStack
  turn: TTurn
  logger?: Logger
}

export interface DialogContext {
  readonly stack: DialogStack
  status(): DialogStatus
  activeDialog(): DialogFrame | undefined
  depth(): number
  begin(dialogId: string, args?: unknown): Promise<DialogTurnResult>
  continue(): Promise<DialogTurnResult>
  cancelAll(): DialogTurnResult
}

const WAITING: DialogTurnResult = { status: 'waiting' }

/**
 * Runs dialogs against one conversation's stack for the length of a turn.
 * The stack is mutated in place; persisting it is the caller's job.
 */
export function createDialogContext<TTurn extends DialogTurn>(deps: DialogContextDeps<TTurn>): DialogContext {
  const { registry, stack, turn } = deps
  const logger = deps.logger ?? createNoopLogger()

  function activeDialog(): DialogFrame | undefined {
    return stack.frames[stack.frames.length - 1]
  }

  function depth(): number {
    return stack.frames.length
  }

  function status(): DialogStatus {
    const frame = activeDialog()
    if (!frame) {
      return 'idle'
    }
    return registry.lookup(frame.id).kind === 'prompt' ? 'awaiting_input' : 'active'
  }

  function promptOptionsOf(frame: DialogFrame): PromptOptions {
    const parsed = promptOptionsSchema.safeParse(frame.args)
    if (!parsed.success) {
      throw new TypeError(`Prompt "${frame.id}" needs options with a prompt text: ${parsed.error.message}`)
    }
    return parsed.data
  }

  async function begin(dialogId: string, args?: unknown): Promise<DialogTurnResult> {
    const definition = registry.lookup(dialogId)
    const frame: DialogFrame = { id: dialogId, stepIndex: 0, values: {} }
    if (args !== undefined) {
      frame.args = args
    }

    if (definition.kind === 'prompt') {
      const options = promptOptionsOf(frame)
      stack.frames.push(frame)
      logger.info({ event: 'dialog_begun', dialogId, kind: 'prompt', depth: stack.frames.length })
      await turn.sendActivity(definition.prompt.render(options, false))
      return WAITING
    }

    stack.frames.push(frame)
    logger.info({ event: 'dialog_begun', dialogId, kind: 'waterfall', depth: stack.frames.length })
    return runStep(frame, definition.steps, { kind: 'none' })
  }

  async function runStep(frame: DialogFrame, steps: WaterfallStep<TTurn>[], input: StepInput): Promise<DialogTurnResult> {
    const index = frame.stepIndex
    const step = steps[index]
    if (step === undefined) {
      return endActive(null)
    }

    frame.stepIndex = index + 1
    const outcome = await step({ turn, values: frame.values, args: frame.args, input, index })
    logger.info({ event: 'dialog_step_executed', dialogId: frame.id, step: index, outcome: outcome.kind })

    switch (outcome.kind) {
      case 'advance':
        return runStep(frame, steps, outcome.value === undefined ? { kind: 'none' } : { kind: 'result', value: outcome.value })
      case 'wait':
        return WAITING
      case 'prompt':
        if (registry.lookup(outcome.promptId).kind !== 'prompt') {
          throw new TypeError(`Dialog "${outcome.promptId}" is not a prompt`)
        }
        return begin(outcome.promptId, outcome.options)
      case 'begin':
        return begin(outcome.dialogId, outcome.args)
      case 'end':
        return endActive(outcome.result)
    }
  }

  async function endActive(result: unknown): Promise<DialogTurnResult> {
    const ended = stack.frames.pop()
    logger.info({ event: 'dialog_ended', dialogId: ended?.id, depth: stack.frames.length })

    const parent = activeDialog()
    if (!parent) {
      return { status: 'complete', result }
    }
    return resume(parent, { kind: 'result', value: result })
  }

  async function resume(frame: DialogFrame, input: StepInput): Promise<DialogTurnResult> {
    const definition = registry.lookup(frame.id)
    if (definition.kind === 'prompt') {
      // A child begun on top of a prompt hands control back to the prompt.
      await turn.sendActivity(definition.prompt.render(promptOptionsOf(frame), false))
      return WAITING
    }
    return runStep(frame, definition.steps, input)
  }

  async function continuePrompt(frame: DialogFrame, behavior: PromptBehavior): Promise<DialogTurnResult> {
    const options = promptOptionsOf(frame)
    const recognition = behavior.recognize(turn.text, options)
    if (!recognition.recognized) {
      logger.info({ event: 'prompt_not_recognized', dialogId: frame.id })
      await turn.sendActivity(behavior.render(options, true))
      return WAITING
    }

    const validation = behavior.validate ? behavior.validate(recognition.value) : accepted(recognition.value)
    if (validation.status === 'rejected') {
      logger.info({ event: 'prompt_rejected', dialogId: frame.id })
      await turn.sendActivity(validation.retryMessage ?? behavior.render(options, true))
      return WAITING
    }

    return endActive(validation.value)
  }

  async function continueDialog(): Promise<DialogTurnResult> {
    const frame = activeDialog()
    if (!frame) {
      return { status: 'empty' }
    }

    const definition = registry.lookup(frame.id)
    if (definition.kind === 'prompt') {
      return continuePrompt(frame, definition.prompt)
    }
    return runStep(frame, definition.steps, { kind: 'result', value: turn.text })
  }

  function cancelAll(): DialogTurnResult {
    const cancelled = stack.frames.splice(0)
    if (cancelled.length === 0) {
      return { status: 'empty' }
    }
    logger.info({ event: 'dialogs_cancelled', dialogIds: cancelled.map(frame => frame.id) })
    return { status: 'cancelled' }
  }

  return {
    stack,
    status,
    activeDialog,
    depth,
    begin,
    continue: continueDialog,
    cancelAll
  }
}
