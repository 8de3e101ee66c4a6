import {getDocument} from 'pdfjs-serverless';

import {errorMessage, RequestError} from 'src/errors';
import type {DocumentRequest, InputSource} from 'src/types';

/**
 * Extracts text content from a PDF buffer using pdfjs-serverless
 */
export async function extractPdfText(pdfBuffer: Uint8Array): Promise<string> {
  const pdf = await getDocument({data: pdfBuffer}).promise;
  const pageTexts = await Promise.all(
    Array.from({length: pdf.numPages}, (_, i) => i + 1).map(async pageNum => {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();
      return textContent.items.map(item => ('str' in item ? item.str : '')).join(' ');
    })
  );

  return pageTexts.join('\n').trim();
}

async function extractText(request: DocumentRequest) {
  if (request.kind !== 'upload' || request.data.byteLength === 0) {
    throw new RequestError(400, 'Uploaded PDF is empty');
  }

  try {
    // pdf.js rejects Buffer instances, it wants a plain Uint8Array
    return await extractPdfText(new Uint8Array(request.data));
  } catch (error) {
    throw new RequestError(422, `PDF parse failed: ${errorMessage(error)}`, {cause: error});
  }
}

function matchRequest(request: DocumentRequest) {
  return request.kind === 'upload' && request.contentType.startsWith('application/pdf');
}

export const pdfSource: InputSource = {
  identifier: 'pdf',
  matchRequest,
  extractText,
};
