export {
  transformRow,
  transformRows,
  type TransformRowInput,
  type TransformRowsInput,
} from './transform'
export {
  selectExecutionStrategy,
  mapWithStrategy,
  POOLED_FEATURE_TYPES,
  type ExecutionStrategy,
} from './strategy'
