export {
  generateWindow,
  parseWindowSpec,
  assertWindowSpec,
  isWindowKind,
  besselI0,
  mainLobeWidth,
  WINDOW_KINDS,
  KAISER_BETA_MIN,
  KAISER_BETA_MAX,
} from './window-functions.js';

export {
  WINDOW_CHARACTERISTICS,
  findWindowCharacteristics,
  windowsMeetingAttenuation,
} from './characteristics.js';
