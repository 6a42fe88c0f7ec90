import { mkdir, stat } from 'fs/promises';
import type { TextExtractionResult, TextExtractor } from '@docstruct/connector-sdk';
import {
  buildExtractionPrompt,
  createConsoleLogger,
  DEFAULT_MAX_ATTEMPTS,
  errorMessage,
  extractJson,
  MissingInputError,
  MissingTemplateError,
  type Logger,
} from '@docstruct/core';
import { isScannedPdf } from '@docstruct/connectors/pdf';
import { scanDocumentJobs, type DocumentJob } from './jobs.js';
import { writeErrorArtifact, writeJsonOutput } from './persist.js';
import { loadTemplate } from './template.js';

/**
 * What the driver needs from the response controller.
 */
export interface ResponseSource {
  obtainResponse(prompt: string, maxAttempts?: number): Promise<string | null>;
  endConversation(): boolean;
}

export interface PipelineRunOptions {
  inputDir: string;
  outputDir: string;
  /** Template mode: path of the JSON structure to embed */
  templatePath?: string;
  /** false = let the model design the structure */
  useTemplate: boolean;
}

export type DocumentOutcome = 'succeeded' | 'invalid_json' | 'failed' | 'skipped';

export interface PipelineSummary {
  total: number;
  succeeded: number;
  invalidJson: number;
  failed: number;
  skipped: number;
  /** Files written, JSON and error artifacts alike */
  outputs: string[];
}

export type PipelineRunResult =
  | { success: true; summary: PipelineSummary }
  | { success: false; error: MissingInputError | MissingTemplateError };

export interface DocumentPipelineOptions {
  maxAttempts?: number;
  logger?: Logger;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    // Missing or unreadable
    return false;
  }
}

function emptySummary(): PipelineSummary {
  return { total: 0, succeeded: 0, invalidJson: 0, failed: 0, skipped: 0, outputs: [] };
}

/**
 * Converts every PDF of a folder, one document at a time.
 */
export class DocumentPipeline {
  private readonly logger: Logger;
  private readonly maxAttempts: number;

  constructor(
    private readonly responses: ResponseSource,
    private readonly extractor: TextExtractor,
    options: DocumentPipelineOptions = {}
  ) {
    this.logger = options.logger ?? createConsoleLogger('Pipeline');
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  async run(options: PipelineRunOptions): Promise<PipelineRunResult> {
    if (!(await isDirectory(options.inputDir))) {
      const error = new MissingInputError(options.inputDir);
      this.logger.error(error.message);
      return { success: false, error };
    }

    await mkdir(options.outputDir, { recursive: true });

    const jobs = await scanDocumentJobs(options.inputDir, options.outputDir);
    const summary = emptySummary();

    if (jobs.length === 0) {
      this.logger.info(`No PDF files found in '${options.inputDir}'.`);
      return { success: true, summary };
    }

    // Every document would fail the same way, so stop before touching any
    if (options.useTemplate && options.templatePath === undefined) {
      const error = new MissingTemplateError();
      this.logger.error(error.message);
      return { success: false, error };
    }

    this.logger.info(`Found ${jobs.length} PDF file(s) to process.`);
    if (!options.useTemplate) {
      this.logger.info('--no-json-template is set: the model will design the JSON structure.');
    }

    for (const job of jobs) {
      summary.total++;
      const outcome = await this.processDocument(job, options, summary.outputs);
      switch (outcome) {
        case 'succeeded':
          summary.succeeded++;
          break;
        case 'invalid_json':
          summary.invalidJson++;
          break;
        case 'failed':
          summary.failed++;
          break;
        case 'skipped':
          summary.skipped++;
          break;
      }
    }

    this.logger.info(
      `Done: ${summary.succeeded} converted, ${summary.invalidJson} invalid JSON, ` +
        `${summary.failed} failed, ${summary.skipped} skipped (of ${summary.total}).`
    );

    return { success: true, summary };
  }

  private async processDocument(
    job: DocumentJob,
    options: PipelineRunOptions,
    outputs: string[]
  ): Promise<DocumentOutcome> {
    this.logger.info(`Processing ${job.fileName}`);

    let text: TextExtractionResult;
    try {
      text = await this.extractor.extract(job.sourcePath);
    } catch (error) {
      text = { success: false, pages: [], fullText: '', pageCount: 0, error: errorMessage(error) };
    }
    if (!text.success) {
      this.logger.error(`Failed to read PDF '${job.fileName}': ${text.error ?? 'unknown error'}`);
      return 'skipped';
    }
    if (isScannedPdf(text)) {
      this.logger.warn(`'${job.fileName}' has little or no embedded text (scanned?). The reply may be empty.`);
    }

    let template: string | undefined;
    if (options.useTemplate && options.templatePath !== undefined) {
      const loaded = await loadTemplate(options.templatePath);
      if (!loaded.success) {
        this.logger.error(`${loaded.error}. Skipping ${job.fileName}.`);
        return 'skipped';
      }
      template = loaded.content;
      this.logger.info(`Using JSON template ${options.templatePath}`);
    }

    const prompt = buildExtractionPrompt({
      documentText: text.fullText,
      ...(template !== undefined ? { template } : {}),
    });

    let response: string | null;
    try {
      response = await this.responses.obtainResponse(prompt, this.maxAttempts);
    } finally {
      // Each document gets its own conversation
      this.responses.endConversation();
    }

    if (response === null) {
      this.logger.error(`No response obtained for '${job.fileName}'.`);
      return 'failed';
    }

    const extracted = extractJson(response);

    try {
      if (extracted.success) {
        await writeJsonOutput(job.outputPath, extracted.json);
        outputs.push(job.outputPath);
        this.logger.info(`Saved ${job.outputPath}`);
        return 'succeeded';
      }

      this.logger.error(`Response for '${job.fileName}' is not valid JSON: ${extracted.error}`);
      await writeErrorArtifact(job.errorPath, response);
      outputs.push(job.errorPath);
      return 'invalid_json';
    } catch (error) {
      this.logger.error(`Failed to write output for '${job.fileName}': ${errorMessage(error)}`);
      return 'failed';
    }
  }
}
