import { z } from 'zod'
import { fail, ok, type DecodeResult } from '../parser/errors.js'
import { SENTENCE_TYPES, type SentenceType } from '../parser/sentence-type.js'

export const sentenceTypeSchema = z.enum(SENTENCE_TYPES)

export const aggregatorConfigSchema = z.object({
  requiredSentences: z.array(sentenceTypeSchema).min(1),
})

export type AggregatorConfig = z.infer<typeof aggregatorConfigSchema>

export function validateRequiredSentences(input: unknown): DecodeResult<SentenceType[]> {
  if (Array.isArray(input) && input.length === 0) return fail({ kind: 'EmptyNavConfig' })
  const parsed = aggregatorConfigSchema.shape.requiredSentences.safeParse(input)
  if (!parsed.success) {
    return fail({
      kind: 'InvalidConfig',
      issues: parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)),
    })
  }
  return ok(parsed.data)
}
