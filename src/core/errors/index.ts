export { NetsynthError, ErrorCode, isNetsynthError, wrapError } from './NetsynthError';
