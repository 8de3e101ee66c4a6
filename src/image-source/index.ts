import {createRequire} from 'node:module';
import path from 'node:path';

import Tesseract from 'tesseract.js';

import type {Env} from 'src/env';
import {errorMessage, RequestError} from 'src/errors';
import type {DocumentRequest, InputSource} from 'src/types';

/**
 * Matches the prefix of a data URL, e.g. "data:image/png;base64,"
 */
const DATA_URL_PREFIX = /^data:[\w/+.-]+;base64,/;

/**
 * English traineddata installed with the @tesseract.js-data/eng package, so
 * OCR never has to download language data at run time
 */
export const BUNDLED_LANG_PATH = path.join(
  path.dirname(createRequire(import.meta.url).resolve('@tesseract.js-data/eng/package.json')),
  '4.0.0_best_int'
);

/**
 * Decodes a base64 image, with or without a data URL prefix
 */
export function decodeBase64Image(encoded: string): Buffer {
  const image = Buffer.from(encoded.trim().replace(DATA_URL_PREFIX, ''), 'base64');

  if (image.byteLength === 0) {
    throw new RequestError(400, 'image_base64 is empty or not valid base64');
  }

  return image;
}

/**
 * Reads the text of an image using tesseract.js
 */
export async function recognizeImage(image: Buffer, env: Env): Promise<string> {
  try {
    const result = await Tesseract.recognize(image, env.OCR_LANG, {
      langPath: env.OCR_LANG_PATH ?? BUNDLED_LANG_PATH,
      cacheMethod: 'none',
    });
    return result.data.text;
  } catch (error) {
    throw new RequestError(422, `Image decode failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function readImage(request: DocumentRequest): Buffer {
  if (request.kind === 'upload') {
    if (request.data.byteLength === 0) {
      throw new RequestError(400, 'Uploaded image is empty');
    }
    return request.data;
  }

  return decodeBase64Image(request.body.image_base64 ?? '');
}

async function extractText(request: DocumentRequest, env: Env) {
  const text = await recognizeImage(readImage(request), env);

  console.log('Recognized image text', {length: text.length});

  return text;
}

function matchRequest(request: DocumentRequest) {
  return request.kind === 'upload'
    ? request.contentType.startsWith('image/')
    : request.body.image_base64 !== undefined;
}

export const imageSource: InputSource = {
  identifier: 'image',
  matchRequest,
  extractText,
};
