export * from './types.js';
export { AlertScheduler } from './alert-scheduler.js';
export { sleep, clampDelay } from './sleep.js';
