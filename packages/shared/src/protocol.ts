import { z } from 'zod'
import { RecencyEnum } from './research.js'

// Wire messages exchanged with the planner and reader agents. Field names are
// snake_case because that is what the prompts ask the models to emit.

const NotesSchema = z.string().nullable().optional()

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1),
  when: RecencyEnum.optional(),
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  allow_domains: z.array(z.string()).optional(),
  deny_domains: z.array(z.string()).optional(),
  max_results: z.number().int().positive().optional()
})
export type SearchRequest = z.infer<typeof SearchRequestSchema>

export const DirectAnswerActionSchema = z.object({
  action: z.literal('direct_answer'),
  direct_answer: z.string().optional(),
  notes: NotesSchema
})

export const SearchActionSchema = z.object({
  action: z.literal('search_then_answer'),
  search: SearchRequestSchema,
  notes: NotesSchema
})

// At reflection `direct_answer` means "stop researching"; the text is optional.
export const ReflectionMessageSchema = z.discriminatedUnion('action', [
  DirectAnswerActionSchema,
  SearchActionSchema
])
export type ReflectionMessage = z.infer<typeof ReflectionMessageSchema>

export const PlanMessageSchema = ReflectionMessageSchema.superRefine((message, ctx) => {
  if (message.action !== 'direct_answer') return
  if (message.direct_answer === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.invalid_type,
      expected: 'string',
      received: 'undefined',
      path: ['direct_answer'],
      message: 'direct_answer is required when action is direct_answer'
    })
  } else if (!message.direct_answer.trim()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['direct_answer'],
      message: 'direct_answer must not be empty'
    })
  }
})
export type PlanMessage = z.infer<typeof PlanMessageSchema>

export const SelectionMessageSchema = z.object({
  selected_ids: z.array(z.string()),
  notes: NotesSchema
})
export type SelectionMessage = z.infer<typeof SelectionMessageSchema>

export const ReaderReportMessageSchema = z.object({
  title: z.string(),
  summary: z.string(),
  key_points: z.array(z.string()),
  relevance_score: z.number().min(0).max(1),
  notes: NotesSchema
})
export type ReaderReportMessage = z.infer<typeof ReaderReportMessageSchema>

export const SynthesisMessageSchema = z.object({
  answer: z.string().refine((value) => value.trim().length > 0, { message: 'answer must not be empty' }),
  key_points: z.array(z.string()),
  used_results: z.array(z.string()),
  notes: NotesSchema
})
export type SynthesisMessage = z.infer<typeof SynthesisMessageSchema>
