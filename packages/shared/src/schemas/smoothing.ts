import { z } from 'zod'

const windowSize = z.number().int().min(1).default(5)
const sigma = z.number().positive('Sigma must be positive').default(1.0)

export const smoothingParamsSchema = z.discriminatedUnion('method', [
  z.object({ method: z.literal('moving-average'), windowSize }),
  z.object({ method: z.literal('gaussian'), windowSize, sigma }),
  z.object({ method: z.literal('savitzky-golay'), windowSize }),
])

export const filterParamsSchema = z.discriminatedUnion('method', [
  z.object({ method: z.literal('median'), windowSize }),
  z.object({ method: z.literal('average'), windowSize }),
  z.object({ method: z.literal('gaussian'), windowSize, sigma }),
  z.object({
    method: z.literal('butterworth'),
    cutoff: z.number().positive('Cutoff must be positive').default(0.2),
    order: z.number().int().min(1).default(2),
  }),
])

export type SmoothingParamsInput = z.input<typeof smoothingParamsSchema>
export type FilterParamsInput = z.input<typeof filterParamsSchema>
