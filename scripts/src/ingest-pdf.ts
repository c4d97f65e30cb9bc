#!/usr/bin/env node
/**
 * ingest-pdf: extract page text, render page images with OCR, and write a
 * manifest for one PDF.
 *
 * Usage:
 *   npm run ingest -- <pdf_path> <output_dir> [options]
 *   ingest-pdf --help
 */

import { runCli } from '../../lib/src/cli/index.js';

runCli(process.argv.slice(2), {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  });
