export {
  designWindowedFilter,
  assertFilterSpecification,
  stepOrder,
  MAX_TAPS,
} from './windowed-design.js';

export { designFromTolerances } from './tolerance-design.js';
