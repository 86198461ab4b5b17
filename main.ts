import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { AcademicReader } from './src/academic-reader';
import { createPdfjsEngine } from './src/pdf/pdfjs';
import { validateSettings } from './src/services/settings-validator';
import type { AcademicReaderSettings } from './src/types';

const USAGE = `Usage: npm start -- <command> <pdfPath> [--page N] [--chunk-size N] [--config settings.json]

Commands:
  sections          detect academic sections
  key-sections      key sections, truncated for agents
  abstract          the abstract (header or heuristic)
  section-summary   section coverage and statistics
  citations         in-text citations and parsed references
  citation-summary  citation counts, style and reference years
  text              reading-ordered text (whole document, or --page N)
  chunks            sentence-aligned content chunks
  structure         overall document structure analysis`;

type CliArgs = {
  command: string;
  pdfPath: string;
  page?: number;
  chunkSize?: number;
  configPath?: string;
};

function parseIntFlag(name: string, value: string | undefined): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new Error(`--${name} expects an integer, got "${value ?? ''}"`);
  return n;
}

function parseArgs(argv: string[]): CliArgs | null {
  const positional: string[] = [];
  const out: Partial<CliArgs> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--page') out.page = parseIntFlag('page', argv[++i]);
    else if (arg === '--chunk-size') out.chunkSize = parseIntFlag('chunk-size', argv[++i]);
    else if (arg === '--config') out.configPath = argv[++i];
    else positional.push(arg);
  }
  const [command, pdfPath] = positional;
  if (!command || !pdfPath) return null;
  return { ...out, command, pdfPath };
}

async function loadSettings(configPath?: string): Promise<AcademicReaderSettings> {
  if (!configPath) return validateSettings(undefined);
  const raw: unknown = JSON.parse(await readFile(configPath, 'utf8'));
  return validateSettings(raw);
}

async function run(reader: AcademicReader, args: CliArgs): Promise<unknown> {
  switch (args.command) {
    case 'sections':
      return reader.detectSections(args.pdfPath);
    case 'key-sections':
      return reader.extractKeySections(args.pdfPath);
    case 'abstract':
      return reader.extractAbstract(args.pdfPath);
    case 'section-summary':
      return reader.getSectionSummary(args.pdfPath);
    case 'citations':
      return reader.extractCitations(args.pdfPath);
    case 'citation-summary':
      return reader.getCitationSummary(args.pdfPath);
    case 'text':
      return args.page === undefined
        ? reader.extractAcademicText(args.pdfPath)
        : reader.extractAcademicText(args.pdfPath, args.page);
    case 'chunks':
      return reader.chunkAcademicContent(args.pdfPath, args.chunkSize);
    case 'structure':
      return reader.analyzeDocumentStructure(args.pdfPath);
    default:
      return null;
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const settings = await loadSettings(args.configPath);
  const engine = createPdfjsEngine();
  const reader = new AcademicReader(engine, settings);
  const pdfPath = path.resolve(process.cwd(), args.pdfPath);

  try {
    const result = await run(reader, { ...args, pdfPath });
    if (result === null) {
      console.error(`Unknown command: ${args.command}\n\n${USAGE}`);
      process.exitCode = 1;
      return;
    }
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await engine.close();
  }
}

main().catch((err: unknown) => {
  console.error('[academic-reader] command failed', err);
  process.exitCode = 1;
});
