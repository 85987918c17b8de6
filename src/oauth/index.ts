export {
  access,
  secret,
  digest,
  useConfigFile,
  useEnvironment,
  emptyCredential,
  encodeDigest,
  DEFAULT_ENV_PREFIX,
  type Credential,
  type ConfigurationOption,
} from './options.js';
export { resolveCredential } from './resolver.js';
export {
  PasswordGrantAuthorizer,
  TOKEN_PATH,
  type PasswordGrantAuthorizerOptions,
} from './authorizer.js';
