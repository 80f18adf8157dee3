/** Section looked up when no target is given. */
export const DEFAULT_SECTION = 'qizx';

/** File name searched for in the home and working directories. */
export const CONFIG_FILE_NAME = '.qizx';

/**
 * Server certificate verification policy for `https` endpoints.
 * `bundle` verifies against the CA certificates in the given PEM file.
 */
export type TlsVerify = { kind: 'enabled' } | { kind: 'disabled' } | { kind: 'bundle'; path: string };

/**
 * Immutable description of one database endpoint.
 * `endpoint` never carries credentials or a fragment.
 */
export interface ConnectionConfig {
  /** Absolute `http`/`https` URL of the REST API */
  readonly endpoint: string;
  /** User name for Basic authentication, percent-decoded */
  readonly username?: string;
  /** Password for Basic authentication, percent-decoded */
  readonly password?: string;
  /** Server certificate verification policy */
  readonly tlsVerify: TlsVerify;
  /** PEM file with the client certificate and key */
  readonly clientCert?: string;
  /** Default library, taken from the URL fragment */
  readonly library?: string;
}

/** Recognised keys of one config file section. */
export interface ConfigSection {
  url?: string;
  verify?: boolean | string;
  cert?: string;
}

/** Parsed config file, keyed by section name. */
export type ConfigStore = Readonly<Record<string, Readonly<ConfigSection>>>;
