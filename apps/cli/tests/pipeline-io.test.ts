import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createDocumentJob, scanDocumentJobs } from '../src/pipeline/jobs.js';
import { loadTemplate } from '../src/pipeline/template.js';
import { formatJsonOutput, writeErrorArtifact, writeJsonOutput } from '../src/pipeline/persist.js';

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'docstruct-io-'));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe('Document jobs', () => {
  it('derives output paths by replacing the extension', () => {
    expect(createDocumentJob('in', 'out', 'report.v2.pdf')).toEqual({
      fileName: 'report.v2.pdf',
      sourcePath: join('in', 'report.v2.pdf'),
      outputPath: join('out', 'report.v2.json'),
      errorPath: join('out', 'report.v2.json.error.txt'),
    });
  });

  it('lists PDF files only, in name order', async () => {
    writeFileSync(join(workDir, 'b.pdf'), '');
    writeFileSync(join(workDir, 'a.PDF'), '');
    writeFileSync(join(workDir, 'notes.txt'), '');
    mkdirSync(join(workDir, 'folder.pdf'));

    const jobs = await scanDocumentJobs(workDir, 'out');

    expect(jobs.map((job) => job.fileName)).toEqual(['a.PDF', 'b.pdf']);
    expect(jobs[0]?.outputPath).toBe(join('out', 'a.json'));
  });

  it('follows symbolic links to PDF files', async () => {
    const inputDir = join(workDir, 'input');
    const elsewhere = join(workDir, 'elsewhere');
    mkdirSync(inputDir);
    mkdirSync(elsewhere);
    writeFileSync(join(elsewhere, 'shared.pdf'), '');
    symlinkSync(join(elsewhere, 'shared.pdf'), join(inputDir, 'linked.pdf'));
    symlinkSync(join(workDir, 'gone.pdf'), join(inputDir, 'dangling.pdf'));
    symlinkSync(elsewhere, join(inputDir, 'folder.pdf'));

    const jobs = await scanDocumentJobs(inputDir, 'out');

    expect(jobs.map((job) => job.fileName)).toEqual(['linked.pdf']);
  });
});

describe('Template loading', () => {
  it('returns the file verbatim', async () => {
    const path = join(workDir, 'template.json');
    writeFileSync(path, '{ "invoice_number": "", "total": 0 }\n');

    expect(await loadTemplate(path)).toEqual({
      success: true,
      content: '{ "invoice_number": "", "total": 0 }\n',
    });
  });

  it('reports a missing file', async () => {
    const path = join(workDir, 'missing.json');

    expect(await loadTemplate(path)).toEqual({
      success: false,
      error: `Template file '${path}' not found`,
    });
  });
});

describe('Persistence', () => {
  it('formats JSON with four-space indentation and a trailing newline', () => {
    expect(formatJsonOutput('{"name":"Müller","items":[1,null],"paid":false}')).toBe(
      '{\n    "name": "Müller",\n    "items": [\n        1,\n        null\n    ],\n    "paid": false\n}\n'
    );
  });

  it('keeps large integers and year keys exactly as received', () => {
    expect(
      formatJsonOutput('{"invoice": 12345678901234567891, "total": 10.50, "2024": "b", "2023": "a"}')
    ).toBe('{\n    "invoice": 12345678901234567891,\n    "total": 10.50,\n    "2024": "b",\n    "2023": "a"\n}\n');
  });

  it('writes JSON and error artifacts', async () => {
    const jsonPath = join(workDir, 'doc.json');
    const errorPath = join(workDir, 'doc.json.error.txt');

    await writeJsonOutput(jsonPath, '{"total": 12.5}');
    await writeErrorArtifact(errorPath, 'Sorry, I cannot help.');

    expect(readFileSync(jsonPath, 'utf8')).toBe('{\n    "total": 12.5\n}\n');
    expect(readFileSync(errorPath, 'utf8')).toBe('Sorry, I cannot help.');
  });
});
