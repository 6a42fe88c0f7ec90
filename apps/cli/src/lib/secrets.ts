import { readFileSync, existsSync } from 'fs';
import { join } from 'path';

/**
 * Secrets Reader
 *
 * Reads secrets from the Docker secrets mount (/run/secrets/) first,
 * falling back to environment variables for local runs.
 */

export const SECRETS_PATH = '/run/secrets';

export interface SecretSource {
  env?: NodeJS.ProcessEnv;
  secretsPath?: string;
}

/**
 * Read a secret value, preferring Docker secrets over env vars.
 *
 * @param name - Secret name (file name in /run/secrets/)
 * @param envVarName - Env var name (defaults to uppercase of name)
 * @returns Secret value or undefined if not found
 */
export function readSecret(
  name: string,
  envVarName?: string,
  source: SecretSource = {}
): string | undefined {
  const secretPath = join(source.secretsPath ?? SECRETS_PATH, name);

  if (existsSync(secretPath)) {
    try {
      const value = readFileSync(secretPath, 'utf8').trim();
      if (value) {
        return value;
      }
    } catch (error) {
      console.error(`[Secrets] Failed to read secret from ${secretPath}:`, error);
    }
  }

  const envName = envVarName || name.toUpperCase().replace(/-/g, '_');
  const value = (source.env ?? process.env)[envName]?.trim();
  return value ? value : undefined;
}

/**
 * Split a comma- or newline-separated credential list.
 */
export function splitCredentialList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(/[,\r\n]/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export const secrets = {
  /**
   * Extra service credentials, merged after --api.
   * Docker secret: docstruct_api_keys
   * Env var: DOCSTRUCT_API_KEYS
   */
  getApiKeys(source?: SecretSource): string[] {
    return splitCredentialList(readSecret('docstruct_api_keys', 'DOCSTRUCT_API_KEYS', source));
  },
};
