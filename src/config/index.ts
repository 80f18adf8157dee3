/**
 * Config entrypoint: connection settings and the config file resolver.
 * @module
 */

export { type ConnectionOptions, createConnectionConfig } from './connection.js';
export { ConfigResolver, type ConfigResolverOptions } from './resolver.js';
export {
  CONFIG_FILE_NAME,
  type ConfigSection,
  type ConfigStore,
  type ConnectionConfig,
  DEFAULT_SECTION,
  type TlsVerify,
} from './types.js';
