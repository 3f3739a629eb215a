export { SampleValidator } from './SampleValidator';
export type { SampleViolation } from './SampleValidator';
