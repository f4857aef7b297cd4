export {
  SnoozeController,
  SnoozeRejectedError,
  SnoozeErrorCode,
  type SnoozeResult,
  type SnoozeTarget,
  type SnoozeControllerDeps,
} from './snooze-controller.js';
