export { SystemClock } from './clock/system.clock';
export { NodeExecutionIdentity } from './identity/node-execution.identity';
export { NestLoggerSink } from './logger/nest-logger.sink';
export { FileSink } from './logger/file.sink';
