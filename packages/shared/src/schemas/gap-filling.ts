import { z } from 'zod'

const preserveEndpoints = z.boolean().default(true)
const windowSize = z.number().int().min(1).default(3)

export const gapFillParamsSchema = z.discriminatedUnion('method', [
  z.object({ method: z.literal('linear'), preserveEndpoints }),
  z.object({
    method: z.literal('cubic-spline'),
    tension: z.number().min(0).max(1).default(0.5),
    preserveEndpoints,
  }),
  z.object({ method: z.literal('constant-velocity'), windowSize, preserveEndpoints }),
  z.object({
    method: z.literal('accelerated-motion'),
    windowSize,
    accelerationWeight: z.number().finite().default(1.0),
    preserveEndpoints,
  }),
  z.object({ method: z.literal('average'), windowSize, preserveEndpoints }),
])

export const extrapolationParamsSchema = z.object({
  method: z.enum(['linear', 'last-velocity', 'quadratic']),
  fitPoints: z.number().int().min(1).default(5),
})

export type GapFillParamsInput = z.input<typeof gapFillParamsSchema>
export type ExtrapolationParamsInput = z.input<typeof extrapolationParamsSchema>
