// src/core/auth/types.ts

export interface Credentials {
  username: string;
  password: string;
}

/**
 * Where the credential for a client comes from. At most one source may be
 * configured.
 */
export type AuthSource =
  | { kind: 'none' }
  | { kind: 'credentials'; username: string; password: string }
  | { kind: 'basic'; value: string }
  | { kind: 'basicFile'; path: string }
  | { kind: 'env'; variable: string; value: string };

/**
 * Where extra query parameters come from. A `basic_auth` entry inside them
 * is lifted out as the credential.
 */
export type ExtraParamsSource =
  | { kind: 'none' }
  | { kind: 'inline'; params: Record<string, string>; lookup?: string }
  | { kind: 'jsonFile'; path: string; lookup?: string }
  | { kind: 'yamlFile'; path: string; lookup?: string }
  | { kind: 'env'; variable: string; value: string };

export interface AuthSources {
  auth: AuthSource;
  extraParams: ExtraParamsSource;
}

export interface RequestDecoration {
  credentials?: Credentials;
  extraParams: Record<string, string>;
}

export interface UserAgentOptions {
  userAgent?: string;
  configYaml?: string;
  lookup?: string;
  prefix?: string;
  preprefix?: string;
}
