import { describe, expect, it } from 'vitest';

import { roundCapacity, validateRecontractEstimate } from '@/modules/recontracts/core/validation.js';

import { makeRecontractInput } from '../../fixtures/builders.js';

const TODAY = '2025-07-01';

const messageFor = (overrides: Parameters<typeof makeRecontractInput>[0]): string =>
  validateRecontractEstimate(makeRecontractInput(overrides), TODAY)._unsafeUnwrapErr().message;

describe('validateRecontractEstimate', () => {
  it('prepends the implicit zero-capacity plant', () => {
    const result = validateRecontractEstimate(
      makeRecontractInput({
        plants: [
          { capacityMw: 1.25, ppaUnitPriceYenPerKwh: 12.5 },
          { capacityMw: 2, ppaUnitPriceYenPerKwh: null },
        ],
      }),
      TODAY
    );

    expect(result._unsafeUnwrap().plants).toEqual([
      { capacityMw: 0, ppaUnitPriceYenPerKwh: null },
      { capacityMw: 1.3, ppaUnitPriceYenPerKwh: 12.5 },
      { capacityMw: 2, ppaUnitPriceYenPerKwh: null },
    ]);
  });

  it('stores only the implicit plant when none are sent', () => {
    const result = validateRecontractEstimate(makeRecontractInput(), TODAY);

    expect(result._unsafeUnwrap().plants).toEqual([{ capacityMw: 0, ppaUnitPriceYenPerKwh: null }]);
  });

  it('trims supply point numbers', () => {
    const result = validateRecontractEstimate(
      makeRecontractInput({ supplyPointNumbers: ['  SPN-A ', 'SPN-B'] }),
      TODAY
    );

    expect(result._unsafeUnwrap().supplyPointNumbers).toEqual(['SPN-A', 'SPN-B']);
  });

  it('accepts both window edges', () => {
    expect(
      validateRecontractEstimate(makeRecontractInput({ desiredQuoteDate: TODAY }), TODAY).isOk()
    ).toBe(true);
    expect(
      validateRecontractEstimate(makeRecontractInput({ desiredQuoteDate: '2025-08-01' }), TODAY).isOk()
    ).toBe(true);
  });

  it('rejects quote_effective_days other than 30 or 60', () => {
    expect(messageFor({ quoteEffectiveDays: 45 })).toBe('quote_effective_days must be 30 or 60');
  });

  it.each(['2025-06-30', '2025-08-02', '2025-02-30', 'tomorrow'])(
    'rejects desired_quote_date %s',
    (desiredQuoteDate) => {
      expect(messageFor({ desiredQuoteDate })).toBe(
        'desired_quote_date must be between 2025-07-01 and 2025-08-01'
      );
    }
  );

  it('rejects remarks over 500 characters', () => {
    expect(messageFor({ remarks: 'x'.repeat(501) })).toBe('remarks must be at most 500 characters');
    expect(
      validateRecontractEstimate(makeRecontractInput({ remarks: 'x'.repeat(500) }), TODAY).isOk()
    ).toBe(true);
  });

  it('counts remarks by character rather than UTF-16 unit', () => {
    const emoji = '\u{1F600}';
    expect(
      validateRecontractEstimate(makeRecontractInput({ remarks: emoji.repeat(300) }), TODAY).isOk()
    ).toBe(true);
    expect(
      validateRecontractEstimate(makeRecontractInput({ remarks: emoji.repeat(500) }), TODAY).isOk()
    ).toBe(true);
    expect(messageFor({ remarks: emoji.repeat(501) })).toBe(
      'remarks must be at most 500 characters'
    );
  });

  it('counts supply point numbers by character', () => {
    expect(
      validateRecontractEstimate(
        makeRecontractInput({ supplyPointNumbers: ['\u{20B9F}'.repeat(64)] }),
        TODAY
      ).isOk()
    ).toBe(true);
  });

  it('requires 1 to 20 supply points', () => {
    const expected = 'supply_points must contain between 1 and 20 entries';
    expect(messageFor({ supplyPointNumbers: [] })).toBe(expected);
    expect(
      messageFor({ supplyPointNumbers: Array.from({ length: 21 }, (_, i) => `SPN-${String(i)}`) })
    ).toBe(expected);
  });

  it('rejects blank or over-long supply point numbers', () => {
    expect(messageFor({ supplyPointNumbers: ['SPN-A', '   '] })).toBe(
      'supply_points[1].supply_point_number must be 1-64 characters'
    );
    expect(messageFor({ supplyPointNumbers: ['9'.repeat(65)] })).toBe(
      'supply_points[0].supply_point_number must be 1-64 characters'
    );
  });

  it('allows at most three user plants', () => {
    const plant = { capacityMw: 1, ppaUnitPriceYenPerKwh: null };
    expect(messageFor({ plants: [plant, plant, plant, plant] })).toBe(
      'plants must contain at most 3 entries'
    );
  });

  it('rejects negative capacity and price', () => {
    expect(messageFor({ plants: [{ capacityMw: -0.1, ppaUnitPriceYenPerKwh: null }] })).toBe(
      'plants[0].capacity_mw must be a number >= 0'
    );
    expect(messageFor({ plants: [{ capacityMw: 1, ppaUnitPriceYenPerKwh: -1 }] })).toBe(
      'plants[0].ppa_unit_price_yen_per_kwh must be a number >= 0'
    );
  });

  it('reports the first failing rule', () => {
    expect(messageFor({ quoteEffectiveDays: 7, supplyPointNumbers: [] })).toBe(
      'quote_effective_days must be 30 or 60'
    );
  });
});

describe('roundCapacity', () => {
  it('rounds half up to one decimal place', () => {
    expect(roundCapacity(1.25)).toBe(1.3);
    expect(roundCapacity(1.24)).toBe(1.2);
    expect(roundCapacity(0.05)).toBe(0.1);
  });
});
