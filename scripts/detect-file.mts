#!/usr/bin/env node

/**
 * Run the amount detection pipeline against a local document
 *
 * Usage:
 *   npx tsx scripts/detect-file.mts <file>
 *
 * Text files (.txt) are read as is, PDFs (.pdf) through their text layer and
 * anything else is treated as an image and run through OCR. The detection
 * result is printed as JSON.
 *
 * Configuration is read from the environment and `.env`, same as the server.
 */

import 'dotenv/config';

import {readFileSync} from 'node:fs';
import {extname} from 'node:path';

import {detectAmounts} from '../src/detect';
import {type Env, parseEnv} from '../src/env';
import {recognizeImage} from '../src/image-source';
import {extractPdfText} from '../src/pdf-source';

async function readDocument(path: string, env: Env) {
  const extension = extname(path).toLowerCase();
  const data = readFileSync(path);

  if (extension === '.txt') {
    return data.toString('utf8');
  }
  if (extension === '.pdf') {
    return extractPdfText(new Uint8Array(data));
  }

  return recognizeImage(data, env);
}

async function main() {
  const [path] = process.argv.slice(2);

  if (path === undefined) {
    console.error('Usage: npx tsx scripts/detect-file.mts <file>');
    process.exit(1);
  }

  const env = parseEnv(process.env);
  const text = await readDocument(path, env);
  const result = await detectAmounts(text, env);

  console.log(JSON.stringify(result, null, 2));
}

main().catch(error => {
  console.error('Failed to detect amounts', error);
  process.exit(1);
});
