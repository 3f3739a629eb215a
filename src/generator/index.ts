export { SampleGenerator, generateSamples } from './SampleGenerator';
export type { SampleGeneratorOptions } from './SampleGenerator';
