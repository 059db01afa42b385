/**
 * @fileoverview Tactician configuration
 *
 * - `tactician_config`: config file discovery, parsing and validation
 */

export {
  CONFIG_FILE_NAMES,
  DEFAULT_INCLUDE,
  DEFAULT_EXCLUDE,
  TacticianConfigSchema,
  FailOnSchema,
  parseConfig,
  defaultConfig,
  loadConfig,
  type TacticianConfig,
  type TacticianConfigInput,
  type FailOn,
  type LoadedConfig,
} from './tactician_config.js';
