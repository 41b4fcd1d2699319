export { GroupParser, parseGroups } from './tags';
export {
  loadConfig,
  loadTagCatalogConfig,
  toParserOptions,
  CONFIG_DEFAULTS,
  DEFAULT_CONFIG_PATH,
} from './config';
export type { ConfigWarning, LoadConfigResult, ResolvedTagCatalogConfig } from './config';
export { createLogger, createRootLogger } from './shared/logger';
export {
  TagCatalogError,
  MalformedHeaderError,
  CatalogIoError,
  ConfigError,
} from './shared/types';
export type {
  Group,
  ParseResult,
  ParserOptions,
  TagCatalogConfig,
  EnvConfig,
  ErrorSeverity,
  ErrorContext,
} from './shared/types';
