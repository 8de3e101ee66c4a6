import {RequestError} from 'src/errors';
import type {DocumentRequest, InputSource} from 'src/types';

export const NO_INPUT_REASON = 'No valid document_text or image provided';

function extractText(request: DocumentRequest) {
  const text = request.kind === 'json' ? request.body.document_text : undefined;

  if (text === undefined || text.trim() === '') {
    throw new RequestError(400, NO_INPUT_REASON);
  }

  return Promise.resolve(text);
}

function matchRequest(request: DocumentRequest) {
  return request.kind === 'json' && request.body.document_text !== undefined;
}

export const textSource: InputSource = {
  identifier: 'text',
  matchRequest,
  extractText,
};
