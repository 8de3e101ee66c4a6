import {describe, expect, it} from 'vitest';

import {detectCurrency, extractContext, extractTokens, parseAmount} from './index';

const NOISY_BILL = 'T0tal: Rs l200 | Pald: 1000 | Due: 200 ... tax 50';

describe('extractTokens', () => {
  it('extracts and corrects the amounts of a noisy bill', () => {
    const tokens = extractTokens(NOISY_BILL);

    expect(tokens).toEqual([
      {
        id: 0,
        raw: 'l200',
        value: 1200,
        index: 10,
        currencyHint: 'RS',
        context: 'T0tal: Rs l200',
      },
      {
        id: 1,
        raw: '1000',
        value: 1000,
        index: 23,
        currencyHint: null,
        context: 'Pald: 1000',
      },
      {
        id: 2,
        raw: '200',
        value: 200,
        index: 35,
        currencyHint: null,
        context: 'Due: 200 ... tax 50',
      },
      {
        id: 3,
        raw: '50',
        value: 50,
        index: 47,
        currencyHint: null,
        context: 'Due: 200 ... tax 50',
      },
    ]);
  });

  it('returns nothing for text without digits', () => {
    expect(extractTokens('Thank you for visiting, get well soon')).toEqual([]);
  });

  it('ignores words made only of digit-like letters', () => {
    const tokens = extractTokens('SOIL lOO IS Total l0O');

    expect(tokens.map(token => token.value)).toEqual([100]);
  });

  it('ignores single characters', () => {
    expect(extractTokens('Bed 5, Ward A')).toEqual([]);
  });

  it('corrects letters inside grouped amounts', () => {
    const [token] = extractTokens('Amount: 1,2O0.5O');

    expect(token.raw).toBe('1,2O0.5O');
    expect(token.value).toBe(1200.5);
  });

  it('skips percentages', () => {
    const tokens = extractTokens('Discount 10% | GST 5 % | Net 900');

    expect(tokens.map(token => token.value)).toEqual([900]);
  });

  it('skips dates and times', () => {
    const tokens = extractTokens('Date 12/05/2024 10:30 Total 450');

    expect(tokens.map(token => token.value)).toEqual([450]);
  });

  it('reads amounts glued to a currency word', () => {
    const [token] = extractTokens('Paid Rs1200 by card');

    expect(token.value).toBe(1200);
    expect(token.currencyHint).toBe('RS');
  });

  it('reads amounts followed by a currency word', () => {
    const tokens = [...extractTokens('Total 1200Rs'), ...extractTokens('Total 1200INR')];

    expect(tokens.map(token => [token.raw, token.value, token.currencyHint])).toEqual([
      ['1200', 1200, 'RS'],
      ['1200', 1200, 'INR'],
    ]);
  });

  it('reads currency words in any case', () => {
    const tokens = [...extractTokens('Total usd45'), ...extractTokens('Paid rs500')];

    expect(tokens.map(token => [token.raw, token.value, token.currencyHint])).toEqual([
      ['45', 45, 'USD'],
      ['500', 500, 'RS'],
    ]);
  });

  it('skips identifiers too long to be amounts', () => {
    const tokens = extractTokens('Invoice 12345678901234567891 | Total 450');

    expect(tokens.map(token => token.value)).toEqual([450]);
  });

  it('maps currency symbols to codes', () => {
    const tokens = extractTokens('Total $45.90 | Tax 4.10 EUR');

    expect(tokens.map(token => token.currencyHint)).toEqual(['USD', 'EUR']);
  });

  it('keeps every context a verbatim part of the text', () => {
    const text =
      'Patient admitted to the general ward for observation, room charges 850 and nursing 300\nTotal 1150';

    const tokens = extractTokens(text);

    expect(tokens.map(token => token.value)).toEqual([850, 300, 1150]);
    for (const token of tokens) {
      expect(text.includes(token.context)).toBe(true);
      expect(token.context).toContain(token.raw);
    }
  });
});

describe('parseAmount', () => {
  it('parses plain integers and decimals', () => {
    expect(parseAmount('1200')).toBe(1200);
    expect(parseAmount('99.95')).toBe(99.95);
  });

  it('treats comma groups of three as thousands', () => {
    expect(parseAmount('1,234')).toBe(1234);
    expect(parseAmount('1,20,000')).toBe(120000);
  });

  it('treats a short comma group as decimals', () => {
    expect(parseAmount('12,5')).toBe(12.5);
  });

  it('uses the last separator as the decimal point', () => {
    expect(parseAmount('1,234.56')).toBe(1234.56);
    expect(parseAmount('1.234,56')).toBe(1234.56);
  });

  it('treats repeated dots as thousands', () => {
    expect(parseAmount('1.234.567')).toBe(1234567);
  });

  it('rejects values beyond safe integer precision', () => {
    expect(parseAmount('12345678901234567891')).toBeNull();
    expect(parseAmount('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('rejects separators that do not form an amount', () => {
    expect(parseAmount('1,2345')).toBeNull();
    expect(parseAmount('12.5.24')).toBeNull();
    expect(parseAmount('1.234,5,6')).toBeNull();
  });
});

describe('extractContext', () => {
  it('keeps the snippet within its line', () => {
    const text = 'Consultation fee 500\nMedicines 1,250.00\nTotal 1750';
    const start = text.indexOf('1,250.00');

    expect(extractContext(text, start, start + '1,250.00'.length)).toBe(
      'Medicines 1,250.00'
    );
  });
});

describe('detectCurrency', () => {
  it('prefers a marker written next to an amount', () => {
    const text = 'Prices in USD may vary | Total ₹ 500';

    expect(detectCurrency(text, extractTokens(text))).toBe('INR');
  });

  it('falls back to the first marker in the text', () => {
    const text = 'All amounts in GBP\nTotal 500';

    expect(detectCurrency(text, extractTokens(text))).toBe('GBP');
  });

  it('returns null without markers', () => {
    const text = 'Total 500';

    expect(detectCurrency(text, extractTokens(text))).toBeNull();
  });
});
