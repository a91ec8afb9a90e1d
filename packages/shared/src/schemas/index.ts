export {
  monteCarloRequestSchema,
  binomialRequestSchema,
  type MonteCarloRequest,
  type BinomialRequest,
} from './pricing'

export {
  numberField,
  integerField,
  optionalIntegerField,
  optionalNumberField,
  flagField,
} from './fields'
