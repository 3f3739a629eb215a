export { SampleTable } from './SampleTable';
