import { readFileSync } from 'node:fs'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { MessagesError } from './errors.js'
import { createNoopLogger, type Logger } from './logger.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

const messagesSchema = z.record(z.string())

export type Messages = Record<string, string>

export function loadMessages(filePath?: string, logger: Logger = createNoopLogger()): Messages {
  const path = filePath ?? join(__dirname, 'messages', 'en.json')

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    logger.error({ event: 'messages_load_failed', path, error: err })
    throw new MessagesError(`Failed to load messages from ${path}`)
  }

  const result = messagesSchema.safeParse(parsed)
  if (!result.success) {
    logger.error({ event: 'messages_invalid', path, error: result.error.message })
    throw new MessagesError(`Messages file ${path} must map keys to strings`)
  }

  logger.info({ event: 'messages_loaded', path, count: Object.keys(result.data).length })
  return result.data
}

export function getMessage(messages: Messages, key: string): string {
  const message = messages[key]
  if (message === undefined) {
    throw new MessagesError(`Message key not found: ${key}`, key)
  }
  return message
}

export function formatMessage(messages: Messages, key: string, params: Record<string, string> = {}): string {
  return getMessage(messages, key).replace(/\{(\w+)\}/g, (placeholder, name: string) => params[name] ?? placeholder)
}
