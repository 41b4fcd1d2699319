export { loadConfig } from './defaults';
export {
  loadTagCatalogConfig,
  toParserOptions,
  CONFIG_DEFAULTS,
  DEFAULT_CONFIG_PATH,
} from './loader';
export type { ConfigWarning, LoadConfigResult, ResolvedTagCatalogConfig } from './loader';
export { tagCatalogConfigSchema } from './schema';
