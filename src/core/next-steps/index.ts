/**
 * Post-apply reporter exports barrel file.
 */
export {
  NEXT_STEPS_FILENAME,
  GENERIC_NEXT_STEPS,
  consumeSideChannel,
  descriptorNextSteps,
  resolveNextSteps,
} from './reporter.js';
