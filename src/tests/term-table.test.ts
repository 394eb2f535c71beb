import { TermTable } from '../utils/term-table.util';

describe('TermTable', () => {
  const table = new TermTable(['BluRay', 'Blu-ray', 'bluray', 'iT', 'NF'], new Set(['iT', 'NF']));

  test('should match ignoring case and return the first spelling', () => {
    expect(table.lookup('BLURAY')).toBe('BluRay');
    expect(table.lookup('blu-ray')).toBe('Blu-ray');
  });

  test('should match case-sensitive terms only in their exact spelling', () => {
    expect(table.lookup('iT')).toBe('iT');
    expect(table.lookup('It')).toBeUndefined();
    expect(table.has('nf')).toBe(false);
    expect(table.has('NF')).toBe(true);
  });

  test('should return undefined for unknown text', () => {
    expect(table.lookup('Heat')).toBeUndefined();
  });
});
