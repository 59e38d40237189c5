export { toErrorOutput, renderSuccess, renderFailure, emitResult } from './emit.js';
export type { ErrorOutput, ExitCode, OutputSink } from './emit.js';
