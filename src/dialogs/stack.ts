import { z } from 'zod'
import { defineStateKey } from '../state/types.js'

export interface DialogFrame {
  id: string
  /** Index of the next step to run when the frame resumes. */
  stepIndex: number
  values: Record<string, unknown>
  args?: unknown
}

export interface DialogStack {
  frames: DialogFrame[]
}

export const dialogFrameSchema: z.ZodType<DialogFrame> = z.object({
  id: z.string().min(1),
  stepIndex: z.number().int().min(0),
  values: z.record(z.unknown()),
  args: z.unknown().optional()
})

export const dialogStackSchema: z.ZodType<DialogStack> = z.object({
  frames: z.array(dialogFrameSchema)
})

export const dialogStackKey = defineStateKey<DialogStack>('dialogStack', dialogStackSchema, () => ({ frames: [] }))
