export {
  pointStatusSchema,
  curvePointSchema,
  curveDataSchema,
  vec2Schema,
  indexSetSchema,
  frameRangeSchema,
  type CurvePointInput,
  type CurveDataInput,
} from './curve.js'

export {
  smoothingParamsSchema,
  filterParamsSchema,
  type SmoothingParamsInput,
  type FilterParamsInput,
} from './smoothing.js'

export {
  gapFillParamsSchema,
  extrapolationParamsSchema,
  type GapFillParamsInput,
  type ExtrapolationParamsInput,
} from './gap-filling.js'

export {
  curveOperationSchema,
  type CurveOperationInput,
  type ParsedCurveOperation,
} from './operations.js'
