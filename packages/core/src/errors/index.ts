export { PathwatchError } from './pathwatch-error.js';
export type { PathwatchErrorCode } from './pathwatch-error.js';
