/**
 * Process-level traceback hook.
 *
 * A single `uncaughtExceptionMonitor` listener is registered on first
 * install; it prints through whichever printer was installed last. The
 * monitor only observes, so Node's own crash handling still runs.
 */

import type { TracebackPrinter } from '../../core/models/index.js';

let activePrinter: TracebackPrinter | null = null;
let listenerInstalled = false;

function onUncaughtException(error: Error): void {
  activePrinter?.print(error);
}

export function installTracebackHandler(printer: TracebackPrinter): void {
  activePrinter = printer;
  if (!listenerInstalled) {
    process.on('uncaughtExceptionMonitor', onUncaughtException);
    listenerInstalled = true;
  }
}

export function uninstallTracebackHandler(): void {
  if (listenerInstalled) {
    process.off('uncaughtExceptionMonitor', onUncaughtException);
    listenerInstalled = false;
  }
  activePrinter = null;
}

export function getActiveTracebackPrinter(): TracebackPrinter | null {
  return activePrinter;
}
