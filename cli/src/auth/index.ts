/**
 * Auth module index - credentials, their persistence and resolution,
 * authenticators and credential appliers
 */

export {
  Credentials,
  AuthenticatedCredentials,
  validatePort,
  type CredentialsRecord,
  type Endpoint,
  type PurgeHook,
  type TextSink,
} from "./credentials.js";

export {
  CREDENTIALS_FILENAME,
  credentialsPath,
  credentialsRemover,
  envPrefix,
  restoreCredentials,
  type RestoreOptions,
} from "./store.js";

export { PasswordGrantAuthenticator, type Authenticator, type PasswordGrantOptions } from "./authenticator.js";

export { BearerTokenApplier, type CredentialApplier } from "./applier.js";
