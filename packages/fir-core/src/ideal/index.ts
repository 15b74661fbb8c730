export {
  idealImpulseResponse,
  assertBand,
  nominalCutoff,
  sinc,
  CENTER_TOLERANCE,
} from './ideal-response.js';
