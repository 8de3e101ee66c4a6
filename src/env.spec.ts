import {describe, expect, it} from 'vitest';

import {parseEnv} from './env';

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv({})).toEqual({
      PORT: 5001,
      OPENAI_MODEL: 'o4-mini',
      CLASSIFIER_MAX_ATTEMPTS: 3,
      CLASSIFIER_BACKOFF_MS: 1000,
      CLASSIFIER_TIMEOUT_MS: 30000,
      OCR_LANG: 'eng',
      BODY_LIMIT: 10 * 1024 * 1024,
    });
  });

  it('coerces numeric values and treats empty values as unset', () => {
    const env = parseEnv({PORT: '8080', OPENAI_API_KEY: '', CLASSIFIER_MAX_ATTEMPTS: '5'});

    expect(env.PORT).toBe(8080);
    expect(env.OPENAI_API_KEY).toBeUndefined();
    expect(env.CLASSIFIER_MAX_ATTEMPTS).toBe(5);
  });

  it('rejects invalid values', () => {
    expect(() => parseEnv({CLASSIFIER_MAX_ATTEMPTS: '0'})).toThrow(
      /^Invalid configuration: CLASSIFIER_MAX_ATTEMPTS: /
    );
    expect(() => parseEnv({PORT: 'eighty'})).toThrow(/PORT/);
  });

  it('parses the body limit into bytes', () => {
    expect(parseEnv({BODY_LIMIT: '1kb'}).BODY_LIMIT).toBe(1024);
    expect(() => parseEnv({BODY_LIMIT: 'lots'})).toThrow(
      'Invalid configuration: BODY_LIMIT: Expected a size such as 10mb'
    );
  });
});
