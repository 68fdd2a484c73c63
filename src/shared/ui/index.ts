/**
 * UI utilities for terminal output — re-export hub.
 */

export {
  LogManager,
  type LogLevel,
  setLogLevel,
  debug,
  info,
  warn,
  error,
  output,
  status,
} from './LogManager.js';
