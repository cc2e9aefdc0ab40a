import { z } from 'zod'
import { frameRangeSchema, indexSetSchema, vec2Schema } from './curve.js'
import { filterParamsSchema, smoothingParamsSchema } from './smoothing.js'
import { extrapolationParamsSchema, gapFillParamsSchema } from './gap-filling.js'

const finite = z.number().finite()

/** One engine operation as handed over by a UI or script. */
export const curveOperationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('smooth'), indices: indexSetSchema, params: smoothingParamsSchema }),
  z.object({ type: z.literal('filter'), indices: indexSetSchema, params: filterParamsSchema }),
  z.object({ type: z.literal('fill-gap'), range: frameRangeSchema, params: gapFillParamsSchema }),
  z.object({
    type: z.literal('extrapolate'),
    numFrames: z.number().int().min(0),
    direction: z.enum(['forward', 'backward']).default('forward'),
    params: extrapolationParamsSchema,
  }),
  z.object({
    type: z.literal('scale'),
    indices: indexSetSchema,
    scaleX: finite,
    scaleY: finite,
    center: vec2Schema.optional(),
  }),
  z.object({
    type: z.literal('rotate'),
    indices: indexSetSchema,
    angleDegrees: finite,
    center: vec2Schema.optional(),
  }),
  z.object({ type: z.literal('offset'), indices: indexSetSchema, dx: finite, dy: finite }),
  z.object({
    type: z.literal('normalize-velocity'),
    indices: indexSetSchema,
    targetVelocity: finite.optional(),
  }),
  z.object({ type: z.literal('adjust-smoothness'), indices: indexSetSchema, factor: finite }),
])

export type CurveOperationInput = z.input<typeof curveOperationSchema>
export type ParsedCurveOperation = z.infer<typeof curveOperationSchema>
