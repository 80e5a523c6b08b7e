export {
  CorrelationWindow,
  CorrelationSession,
  pathFromObservation,
  DEFAULT_LISTENING_DURATION_MS,
  DEFAULT_LOOKBACK_MS,
} from './correlation-window.js';
export type {
  CorrelationReport,
  CorrelationWindowEvents,
  CorrelationWindowOptions,
  StartOptions,
  StartResult,
} from './correlation-window.js';
export { formatReport, paginate, paginateReport, MAX_REPLY_LENGTH, CONTINUATION_PREFIX } from './report.js';
