import { DuplicateNameError, UnknownDialogError } from '../errors.js'
import type { DialogDefinition, DialogTurn } from './types.js'

export interface DialogRegistry<TTurn extends DialogTurn = DialogTurn> {
  register(dialogId: string, definition: DialogDefinition<TTurn>): void
  lookup(dialogId: string): DialogDefinition<TTurn>
  has(dialogId: string): boolean
  ids(): string[]
}

export function createDialogRegistry<TTurn extends DialogTurn = DialogTurn>(): DialogRegistry<TTurn> {
  const definitions = new Map<string, DialogDefinition<TTurn>>()

  function register(dialogId: string, definition: DialogDefinition<TTurn>): void {
    if (definitions.has(dialogId)) {
      throw new DuplicateNameError(dialogId)
    }
    definitions.set(dialogId, definition)
  }

  function lookup(dialogId: string): DialogDefinition<TTurn> {
    const definition = definitions.get(dialogId)
    if (!definition) {
      throw new UnknownDialogError(dialogId)
    }
    return definition
  }

  function has(dialogId: string): boolean {
    return definitions.has(dialogId)
  }

  function ids(): string[] {
    return [...definitions.keys()]
  }

  return { register, lookup, has, ids }
}
