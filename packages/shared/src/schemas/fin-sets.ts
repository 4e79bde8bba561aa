import { z } from 'zod'

const cardinality = z.number().int().min(0, 'Cardinality must be non-negative')

export const finSetSchema = z.object({
  size: cardinality,
})

export const finFunctionSchema = z.object({
  values: z.array(z.number().int().min(0)),
  codom: cardinality,
}).superRefine((fn, ctx) => {
  fn.values.forEach((value, i) => {
    if (value >= fn.codom) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['values', i],
        message: `Value ${value} is outside codomain of size ${fn.codom}`,
      })
    }
  })
})
