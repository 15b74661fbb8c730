// Shared configuration: metric thresholds, order limits, structured logging.

export {
  DEFAULT_METRICS_SETTINGS,
  DEFAULT_ORDER_LIMITS,
  TOLERANCE_ORDER_LIMITS,
  metricsSettings,
  orderLimits,
  loadMetricsSettings,
  loadOrderLimits,
  resolveMetricsSettings,
  readEnvNumber,
  readEnvNumberList,
  type MetricsSettings,
  type OrderLimits,
} from './settings'

export {
  createLogger,
  logger,
  stdioSink,
  isLogLevel,
  resolveLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogFields,
  type LogEntry,
  type LogSink,
} from './logger'
