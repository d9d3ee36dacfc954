export {
  THEME_NAMES,
  EVENT_LEVELS,
  REQUIRED_STYLE_ROLES,
  BOX_STYLES,
  type ThemeName,
  type EventLevel,
  type RequiredStyleRole,
  type EventStyleRole,
  type StyleRole,
  type StyleDescriptor,
  type StyleMapping,
  type CustomStyleOverrides,
  type VerbosityLevel,
  type OutputCategory,
  type StyledSpan,
  type BoxStyle,
  type DebugConfig,
  type ConsoleStateSnapshot,
} from './types.js';

export type {
  Padding,
  RuleSpec,
  KeyValueRow,
  PanelBody,
  PanelSpec,
  TableSpec,
  TreeNode,
  MarkdownSpec,
  StatusSpec,
  StatusHandle,
  ProgressSpec,
  ProgressTaskSnapshot,
  ProgressView,
  Renderer,
  TerminalInput,
  TracebackPrinter,
} from './renderer.js';

export {
  StyleOverridesSchema,
  ThemeStylesSchema,
  ConsoleSettingsSchema,
  DebugConfigFileSchema,
  ConsoleConfigFileSchema,
  type ConsoleSettings,
  type ConsoleSettingsInput,
  type ConsoleConfigFile,
} from './schemas.js';
