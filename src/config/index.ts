/**
 * sqlweave Configuration
 *
 * Config file loading, code-defined configuration and environment overrides.
 */

export {
  DEFAULT_CONFIG,
  defineConfig,
  parseConfig,
  loadConfig,
  getConfig,
  setConfig,
  clearConfig,
  resolveConfig,
  type ConfigEnvironment,
  type ConfigValues,
  type ResolvedConfig,
  type SqlWeaveConfig,
} from './loader'
