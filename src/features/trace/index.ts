export { runTrace } from './runTrace.js';
