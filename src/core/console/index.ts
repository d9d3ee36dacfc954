export {
  ConsoleFacade,
  type ConsoleOptions,
  type PanelOptions,
  type RuleOptions,
  type CodeOptions,
  type TableOptions,
  type KeyValueOptions,
  type ProgressOptions,
  type SpacerSize,
} from './ConsoleFacade.js';
export { ConsoleState, type ConsoleStateInit } from './ConsoleState.js';
export { resolveBoxStyle, normalizeBoxName, DEFAULT_BOX_STYLE } from './boxStyle.js';
export { formatEventPrefix, formatEventLevel, formatTimestamp, EVENT_LEVEL_WIDTH } from './eventLine.js';
export { buildTree, describeValue, stringifyScalar, toJson } from './structure.js';
