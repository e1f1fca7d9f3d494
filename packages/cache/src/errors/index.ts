export {
  InvalidArgumentError,
  isInvalidArgumentError,
  createEmptyKeyError,
  createInvalidTtlError,
  createInvalidMaxSizeError,
} from './errors.js';
export type { InvalidArgumentCode } from './errors.js';
