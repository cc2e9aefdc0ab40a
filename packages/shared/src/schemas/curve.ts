import { z } from 'zod'

export const pointStatusSchema = z.enum(['normal', 'interpolated', 'keyframe', 'tracked', 'endframe'])

export const curvePointSchema = z.object({
  frame: z.number().int('Frame must be an integer'),
  x: z.number().finite(),
  y: z.number().finite(),
  status: pointStatusSchema.optional(),
})

export const curveDataSchema = z.array(curvePointSchema)

export const vec2Schema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
})

export const indexSetSchema = z.array(z.number().int().min(0, 'Indices are 0-based positions'))

export const frameRangeSchema = z
  .object({
    startFrame: z.number().int(),
    endFrame: z.number().int(),
  })
  .refine((r) => r.startFrame <= r.endFrame, {
    message: 'startFrame must not exceed endFrame',
    path: ['endFrame'],
  })

export type CurvePointInput = z.infer<typeof curvePointSchema>
export type CurveDataInput = z.infer<typeof curveDataSchema>
