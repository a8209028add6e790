// module entry point

// PodPool - Full export from pod-pool module
export * from './lib/pod-pool/index';

// Logger
export {
  Logger,
  ArraySink,
  ConsoleSink,
  LogLevel,
  getLogLevel,
  type ConsoleSinkOptions,
  type LoggerService,
  type LogEntry,
  type LogSink,
  type LogType,
  type LogOptions,
  type LoggerOptions,
  type SinkErrorHandler,
  type ArrayLogTransformer,
} from './lib/logger';
