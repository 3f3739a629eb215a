export { PUBLIC_COLUMNS, ALL_COLUMNS } from './sample';
export type {
  NetworkSample,
  SampleColumn,
  SampleRecord,
  SeedingStrategy,
  TableMetadata,
} from './sample';
