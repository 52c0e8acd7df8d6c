import { describe, expect, it } from 'vitest';

import { day } from '../../../__tests__/test-helpers.js';
import { findPeoplesBankUsdCells, parsePeoplesBankPage } from '../peoples-bank-utils.js';

const today = day('2025-11-21');

function ratesPage(usdRow: string): string {
  return `<html><body><table>
    <thead><tr><th>Currency</th><th>Code</th><th>DD Buy</th><th>DD Sell</th><th>TT Buy</th><th>TT Sell</th></tr></thead>
    <tbody>
      <tr><th scope="row">Euro</th><td>EUR</td><td>1</td><td>2</td><td>3</td><td>350.10</td><td>362.40</td></tr>
      ${usdRow}
    </tbody>
  </table></body></html>`;
}

describe('findPeoplesBankUsdCells', () => {
  it('finds the row headed by a US Dollars row header', () => {
    const html = ratesPage(
      '<tr><th scope="row">US Dollars</th><td>USD</td><td>299.00</td><td>312.00</td><td>300.50</td><td>303.7500</td><td>309.2500</td></tr>'
    );

    expect(findPeoplesBankUsdCells(html)).toEqual(['USD', '299.00', '312.00', '300.50', '303.7500', '309.2500']);
  });

  it('falls back to any row containing the label', () => {
    const html = ratesPage(
      '<tr><td>US Dollars</td><td>USD</td><td>299.00</td><td>312.00</td><td> 1,303.75 </td><td>1,309.25</td></tr>'
    );

    expect(findPeoplesBankUsdCells(html)?.[4]).toBe('1,303.75');
  });

  it('picks the innermost row when the rates table sits inside a layout table', () => {
    const html = `<html><body><table><tr><td>Rates
      <table><tr><td>US Dollars</td><td>USD</td><td>299.00</td><td>312.00</td><td>303.75</td><td>309.25</td></tr></table>
    </td></tr></table></body></html>`;

    expect(findPeoplesBankUsdCells(html)).toEqual(['US Dollars', 'USD', '299.00', '312.00', '303.75', '309.25']);
  });

  it('returns undefined when USD is absent', () => {
    expect(findPeoplesBankUsdCells(ratesPage(''))).toBeUndefined();
  });
});

describe('parsePeoplesBankPage', () => {
  it('reads buy from the fifth and sell from the sixth cell', () => {
    const html = ratesPage(
      '<tr><th scope="row">US Dollars</th><td>USD</td><td>299.00</td><td>312.00</td><td>300.50</td><td>303.7500</td><td>309.2500</td></tr>'
    );

    const candidate = parsePeoplesBankPage(html, today)._unsafeUnwrap();

    expect(candidate.buyRate.toFixed(4)).toBe('303.7500');
    expect(candidate.sellRate.toFixed(4)).toBe('309.2500');
    expect(candidate.source).toBe('PB');
    expect(candidate.date).toBe('2025-11-21');
  });

  it('strips thousands separators', () => {
    const html = ratesPage(
      '<tr><td>US Dollars</td><td>USD</td><td>299.00</td><td>312.00</td><td>1,303.75</td><td>1,309.25</td></tr>'
    );

    expect(parsePeoplesBankPage(html, today)._unsafeUnwrap().buyRate.toFixed(2)).toBe('1303.75');
  });

  it('fails with a parse error when the row is too short', () => {
    const html = ratesPage('<tr><th scope="row">US Dollars</th><td>USD</td><td>299.00</td></tr>');

    const error = parsePeoplesBankPage(html, today)._unsafeUnwrapErr();

    expect(error.kind).toBe('parse');
    expect(error.message).toBe('Expected at least 6 <td> columns in USD row, found 2');
  });

  it('fails with not-found when USD is absent', () => {
    const error = parsePeoplesBankPage(ratesPage(''), today)._unsafeUnwrapErr();

    expect(error.kind).toBe('not-found');
    expect(error.message).toBe("US Dollars row not found on People's Bank page");
  });
});
