export {
  DEFAULT_MODEL_PARAMETERS,
  resolveModelParameters,
  validateModelParameters,
} from './parameters';
export type {
  ModelParameters,
  ModelParameterOverrides,
  LogNormalParameters,
  LossParameters,
  ThroughputParameters,
} from './parameters';
export { totalCost, baseThroughput, observedThroughput } from './throughput';
