export {
  evaluateFrequencyResponse,
  magnitude,
  magnitudeDb,
  unwrap,
  unwrappedPhase,
  compensatedPhase,
  DEFAULT_SAMPLE_COUNT,
  DEFAULT_MAGNITUDE_FLOOR,
} from './frequency-response.js';
