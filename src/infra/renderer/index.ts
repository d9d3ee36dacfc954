export { TerminalRenderer, type TerminalRendererOptions, type OutputStream } from './TerminalRenderer.js';
export { TerminalProgressView, formatDuration, formatPercentage, estimateRemaining } from './progressView.js';
export { applyStyle, chalkForDescriptor } from './styleDescriptor.js';
export { getBoxChars, type BoxChars, type BoxRow } from './boxes.js';
