import {describe, expect, it} from 'vitest';

import {parseEnv} from 'src/env';

import {NO_INPUT_REASON, textSource} from './index';

const env = parseEnv({});

describe('textSource', () => {
  it('matches JSON bodies with document_text', () => {
    expect(textSource.matchRequest({kind: 'json', body: {document_text: 'Total 50'}})).toBe(
      true
    );
    expect(textSource.matchRequest({kind: 'json', body: {}})).toBe(false);
    expect(
      textSource.matchRequest({kind: 'upload', contentType: 'text/plain', data: Buffer.from('x')})
    ).toBe(false);
  });

  it('returns the document text unchanged', async () => {
    const request = {kind: 'json', body: {document_text: '  Total 50\n'}} as const;

    await expect(textSource.extractText(request, env)).resolves.toBe('  Total 50\n');
  });

  it('rejects blank text', async () => {
    const request = {kind: 'json', body: {document_text: ' \n '}} as const;

    await expect(textSource.extractText(request, env)).rejects.toMatchObject({
      status: 400,
      message: NO_INPUT_REASON,
    });
  });
});
