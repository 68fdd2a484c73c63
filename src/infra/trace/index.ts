export {
  type TraceCommand,
  type TraceRunResult,
  resolveTraceCommand,
  formatTraceCommand,
  runTraceTool,
} from './traceTool.js';
