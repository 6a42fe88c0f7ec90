import type { GenerativeClient, ModelSession, ProviderId } from '@docstruct/connector-sdk';
import { ConfigurationError, errorMessage } from '../errors.js';
import { maskCredential } from '../credentials/pool.js';
import { createConsoleLogger, type Logger } from '../logging.js';

/**
 * A model session together with the credential it was bound with.
 */
export interface SessionHandle {
  readonly credential: string;
  readonly modelName: string;
  readonly provider: ProviderId;
  readonly session: ModelSession;
}

export type BindResult =
  | { success: true; handle: SessionHandle }
  | { success: false; error: ConfigurationError };

/**
 * Binds credentials to model sessions of one provider.
 *
 * Holds no credential state of its own; callers pass the credential every time.
 */
export class ModelSessionFactory {
  private readonly logger: Logger;

  constructor(
    private readonly client: GenerativeClient,
    logger?: Logger
  ) {
    this.logger = logger ?? createConsoleLogger('Session');
  }

  get provider(): ProviderId {
    return this.client.provider;
  }

  bind(credential: string, modelName: string): BindResult {
    try {
      const session = this.client.bind(credential, modelName);
      this.logger.info(`Model '${modelName}' bound with credential ${maskCredential(credential)}`);
      return {
        success: true,
        handle: { credential, modelName, provider: this.client.provider, session },
      };
    } catch (error) {
      const message = `Failed to bind model '${modelName}' with credential ${maskCredential(credential)}: ${errorMessage(error)}`;
      this.logger.error(message);
      return { success: false, error: new ConfigurationError(message) };
    }
  }
}
