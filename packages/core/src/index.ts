// Errors
export type { ErrorCode } from './errors.js';
export {
  DocstructError,
  ConfigurationError,
  MissingCredentialsError,
  MissingInputError,
  MissingTemplateError,
  errorMessage,
} from './errors.js';

// Logging
export type { Logger } from './logging.js';
export { createConsoleLogger, silentLogger } from './logging.js';

// Credentials
export type { PoolLoadResult, RotationResult } from './credentials/pool.js';
export { CredentialPool, dedupeCredentials, maskCredential } from './credentials/pool.js';

// Sessions
export type { SessionHandle, BindResult } from './session/factory.js';
export { ModelSessionFactory } from './session/factory.js';
export { ConversationContext } from './session/conversation.js';
export type { AttemptRecord, ResponseControllerOptions } from './session/controller.js';
export { ResponseController, DEFAULT_MAX_ATTEMPTS } from './session/controller.js';

// Prompt and response handling
export type { ExtractionPromptInput } from './prompt/prompt-builder.js';
export { buildExtractionPrompt } from './prompt/prompt-builder.js';
export type { JsonCandidateSource, JsonExtractionResult } from './extraction/json-extractor.js';
export { extractJson, jsonCandidates } from './extraction/json-extractor.js';
export { formatJson } from './extraction/json-format.js';
