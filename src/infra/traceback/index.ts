export { RendererTracebackPrinter } from './TracebackPrinter.js';
export { installTracebackHandler, uninstallTracebackHandler, getActiveTracebackPrinter } from './install.js';
