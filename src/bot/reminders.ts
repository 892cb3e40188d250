import { z } from 'zod'
import { choicePrompt, foundChoiceSchema, textPrompt } from '../dialogs/prompts.js'
import type { DialogRegistry } from '../dialogs/registry.js'
import { advance, end, prompt, waterfall, type WaterfallStep } from '../dialogs/types.js'
import { createTitleValidator } from '../dialogs/validators.js'
import { formatMessage, getMessage, type Messages } from '../messages.js'
import { defineStateKey } from '../state/types.js'
import type { TurnContext } from './turn-context.js'

export const DialogIds = {
  None: 'None',
  CalendarAdd: 'Calendar_Add',
  CalendarFind: 'Calendar_Find',
  TitlePrompt: 'TitlePrompt',
  ShowReminderPrompt: 'ShowReminderPrompt'
} as const

export const reminderTitlesKey = defineStateKey<string[]>('reminderTitles', z.array(z.string()), () => [])

const CHOICE_LABEL_LENGTH = 15

const addArgsSchema = z.object({ title: z.string().min(1) })

export function toChoiceLabel(title: string): string {
  return title.length < CHOICE_LABEL_LENGTH ? title : `${title.substring(0, CHOICE_LABEL_LENGTH)}...`
}

export function registerReminderDialogs(registry: DialogRegistry<TurnContext>, messages: Messages): void {
  const greet: WaterfallStep<TurnContext> = async ({ turn }) => {
    await turn.sendActivity(getMessage(messages, 'welcome'))
    return end()
  }

  const askReminderTitle: WaterfallStep<TurnContext> = async ({ args }) => {
    const preset = addArgsSchema.safeParse(args)
    if (preset.success) {
      return advance(preset.data.title)
    }
    return prompt(DialogIds.TitlePrompt, { prompt: getMessage(messages, 'ask_title') })
  }

  const saveReminder: WaterfallStep<TurnContext> = async ({ turn, input }) => {
    if (input.kind !== 'result' || typeof input.value !== 'string') {
      return end()
    }

    const title = input.value
    const titles = await turn.state.get(turn.user, reminderTitlesKey)
    turn.state.set(turn.user, reminderTitlesKey, [...titles, title])

    await turn.sendActivity(formatMessage(messages, 'reminder_saved', { title }))
    return end(title)
  }

  const showReminders: WaterfallStep<TurnContext> = async ({ turn }) => {
    const titles = await turn.state.get(turn.user, reminderTitlesKey)
    if (titles.length === 0) {
      await turn.sendActivity(getMessage(messages, 'no_reminders'))
      return end()
    }

    return prompt(DialogIds.ShowReminderPrompt, {
      prompt: getMessage(messages, 'select_reminder'),
      retryPrompt: getMessage(messages, 'select_reminder_retry'),
      choices: titles.map(toChoiceLabel)
    })
  }

  const confirmShow: WaterfallStep<TurnContext> = async ({ turn, input }) => {
    const choice = foundChoiceSchema.safeParse(input.kind === 'result' ? input.value : undefined)
    if (choice.success) {
      const titles = await turn.state.get(turn.user, reminderTitlesKey)
      const title = titles[choice.data.index]
      if (title !== undefined) {
        await turn.sendActivity(formatMessage(messages, 'reminder_shown', { title }))
        return end(title)
      }
    }
    return end()
  }

  registry.register(DialogIds.None, waterfall(greet))
  registry.register(DialogIds.CalendarAdd, waterfall(askReminderTitle, saveReminder))
  registry.register(DialogIds.CalendarFind, waterfall(showReminders, confirmShow))
  registry.register(DialogIds.TitlePrompt, textPrompt<TurnContext>(createTitleValidator(getMessage(messages, 'title_too_short'))))
  registry.register(DialogIds.ShowReminderPrompt, choicePrompt<TurnContext>())
}
