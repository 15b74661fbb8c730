export {
  analyzeMetrics,
  findFrequencyAtLevel,
  findCrossing,
  classifyLinearPhase,
  type SymmetryReport,
} from './filter-metrics.js';
