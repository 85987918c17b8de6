export {
  AuthSectionSchema,
  CredentialFileSchema,
  type AuthSection,
  type CredentialFile,
} from './credentials.js';

export {
  ConnectorConfigSchema,
  DEFAULT_TIMEOUT_MS,
  type ConnectorConfig,
  type ConnectorConfigInput,
} from './connector.js';
