export {
  ObservationBuffer,
  DEFAULT_OBSERVATION_MAX_AGE_MS,
  DEFAULT_OBSERVATION_MAX_ENTRIES,
} from './observation-buffer.js';
export type {
  RFObservation,
  ObservationInput,
  ObservationListener,
  ObservationBufferOptions,
} from './observation-buffer.js';
