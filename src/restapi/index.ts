export {
  HttpConnector,
  resourcePath,
  type RestConnector,
  type TokenProvider,
} from './connector.js';
