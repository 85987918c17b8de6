/**
 * Configuration Module - Public API
 */

export {
  AuthSectionSchema,
  CredentialFileSchema,
  ConnectorConfigSchema,
  DEFAULT_TIMEOUT_MS,
  type AuthSection,
  type CredentialFile,
  type ConnectorConfig,
  type ConnectorConfigInput,
} from './schemas/index.js';

export {
  ProcessEnvironment,
  StaticEnvironment,
  FsFileReader,
  type IEnvironment,
  type IFileReader,
} from './sources/index.js';
