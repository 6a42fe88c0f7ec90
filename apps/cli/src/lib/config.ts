/**
 * CLI configuration
 *
 * Parses argv into raw options, then validates and defaults them with zod.
 */

import { z } from 'zod';
import type { ProviderId } from '@docstruct/connector-sdk';
import { DEFAULT_MAX_ATTEMPTS } from '@docstruct/core';
import { DEFAULT_MODELS } from '@docstruct/connectors/llm';
import { secrets, splitCredentialList, type SecretSource } from './secrets.js';

// ═══════════════════════════════════════════════════════════════════════════
// FLAGS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_API_KEY_FILE = '../api_key.txt';
export const DEFAULT_TIMEOUT_MS = 120_000;

const VALUE_FLAGS = {
  '--api': 'api',
  '--model-name': 'modelName',
  '--inputPDF': 'inputPDF',
  '--outputJSON': 'outputJSON',
  '--json-template': 'jsonTemplate',
  '--api-key-file': 'apiKeyFile',
  '--provider': 'provider',
  '--max-attempts': 'maxAttempts',
  '--timeout': 'timeout',
} as const;

const BOOLEAN_FLAGS = {
  '--no-json-template': 'noJsonTemplate',
  '--help': 'help',
  '-h': 'help',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;
type BooleanFlag = keyof typeof BOOLEAN_FLAGS;
type ValueOption = (typeof VALUE_FLAGS)[ValueFlag];
type BooleanOption = (typeof BOOLEAN_FLAGS)[BooleanFlag];

export type RawCliOptions = Partial<Record<ValueOption, string> & Record<BooleanOption, boolean>>;

export const USAGE = `Usage: docstruct [options]

Convert every PDF in a folder to JSON using a generative-language service.

Service and model:
  --api <keys>              One or more API keys, comma-separated.
                            Keys are also read from the key file (one per line)
                            and from DOCSTRUCT_API_KEYS.
  --api-key-file <path>     Credential file. Default: '${DEFAULT_API_KEY_FILE}'
  --provider <name>         gemini | anthropic. Default: 'gemini'
  --model-name <name>       Model to use. Default: '${DEFAULT_MODELS.gemini}'
  --max-attempts <n>        Attempts per document (1-10). Default: ${DEFAULT_MAX_ATTEMPTS}
  --timeout <ms>            Per-request deadline. Default: ${DEFAULT_TIMEOUT_MS}

Input/output:
  --inputPDF <dir>          Folder containing the PDF files. Default: 'input'
  --outputJSON <dir>        Folder for the JSON files. Default: 'output'
  --json-template <path>    File with the JSON structure to fill in.
  --no-json-template        Let the model design the JSON structure instead.

  -h, --help                Show this help.`;

function isValueFlag(flag: string): flag is ValueFlag {
  return Object.hasOwn(VALUE_FLAGS, flag);
}

function isBooleanFlag(flag: string): flag is BooleanFlag {
  return Object.hasOwn(BOOLEAN_FLAGS, flag);
}

function flagFor(option: string): string {
  const entry = Object.entries({ ...VALUE_FLAGS, ...BOOLEAN_FLAGS }).find(([, name]) => name === option);
  return entry ? entry[0] : option;
}

export type ArgParseResult =
  | { success: true; options: RawCliOptions }
  | { success: false; error: string };

/**
 * Split argv into known flags. Accepts `--flag value` and `--flag=value`.
 */
export function parseArgs(argv: readonly string[]): ArgParseResult {
  const options: RawCliOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === undefined) continue;

    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : token.slice(eq + 1);

    if (isBooleanFlag(flag)) {
      if (inlineValue !== undefined) {
        return { success: false, error: `${flag} does not take a value` };
      }
      options[BOOLEAN_FLAGS[flag]] = true;
      continue;
    }

    if (isValueFlag(flag)) {
      let value = inlineValue;
      if (value === undefined) {
        const next = argv[i + 1];
        if (next === undefined || next.startsWith('--')) {
          return { success: false, error: `${flag} requires a value` };
        }
        value = next;
        i++;
      }
      options[VALUE_FLAGS[flag]] = value;
      continue;
    }

    return { success: false, error: `Unknown argument: ${token}` };
  }

  return { success: true, options };
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

const nonEmpty = (label: string) => z.string().trim().min(1, `${label} must not be empty`);

export const cliOptionsSchema = z
  .object({
    api: z.string().optional(),
    modelName: nonEmpty('Model name').optional(),
    inputPDF: nonEmpty('Input folder').default('input'),
    outputJSON: nonEmpty('Output folder').default('output'),
    jsonTemplate: nonEmpty('Template path').optional(),
    noJsonTemplate: z.boolean().default(false),
    apiKeyFile: nonEmpty('Key file path').default(DEFAULT_API_KEY_FILE),
    provider: z.enum(['gemini', 'anthropic']).default('gemini'),
    maxAttempts: z.coerce
      .number()
      .int('Must be a whole number')
      .min(1, 'Must be at least 1')
      .max(10, 'Must be at most 10')
      .default(DEFAULT_MAX_ATTEMPTS),
    timeout: z.coerce
      .number()
      .int('Must be a whole number')
      .positive('Must be positive')
      .default(DEFAULT_TIMEOUT_MS),
    help: z.boolean().default(false),
  })
  .strict();

/**
 * Validated CLI configuration.
 */
export interface CliConfig {
  /** Explicit credentials: --api first, then the secret */
  credentials: string[];
  apiKeyFile: string;
  provider: ProviderId;
  modelName: string;
  inputDir: string;
  outputDir: string;
  /** Set only in template mode */
  templatePath?: string;
  useTemplate: boolean;
  maxAttempts: number;
  timeoutMs: number;
  help: boolean;
}

export type ConfigResult = { success: true; config: CliConfig } | { success: false; error: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const option = issue.path.map(String).join('.');
      return option ? `${flagFor(option)}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Build the run configuration from argv and the secret sources.
 */
export function loadCliConfig(argv: readonly string[], source: SecretSource = {}): ConfigResult {
  const parsed = parseArgs(argv);
  if (!parsed.success) {
    return parsed;
  }

  const validated = cliOptionsSchema.safeParse(parsed.options);
  if (!validated.success) {
    return { success: false, error: formatIssues(validated.error) };
  }

  const options = validated.data;
  const useTemplate = !options.noJsonTemplate;

  return {
    success: true,
    config: {
      credentials: [...splitCredentialList(options.api), ...secrets.getApiKeys(source)],
      apiKeyFile: options.apiKeyFile,
      provider: options.provider,
      modelName: options.modelName ?? DEFAULT_MODELS[options.provider],
      inputDir: options.inputPDF,
      outputDir: options.outputJSON,
      ...(useTemplate && options.jsonTemplate !== undefined ? { templatePath: options.jsonTemplate } : {}),
      useTemplate,
      maxAttempts: options.maxAttempts,
      timeoutMs: options.timeout,
      help: options.help,
    },
  };
}
