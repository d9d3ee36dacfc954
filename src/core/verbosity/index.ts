export { allows, clampVerbosity, MIN_VERBOSITY, MAX_VERBOSITY } from './VerbosityGate.js';
