export {
  ProgressTracker,
  UnknownTaskError,
  type AddTaskOptions,
  type UpdateTaskOptions,
} from './ProgressTracker.js';
