export { ReadlineTerminalInput, MutableOutput, type ReadlineTerminalInputOptions } from './TerminalInput.js';
