import { describe, expect, it } from 'vitest';
import { formatCsv, normalizeHeader, parseCsv } from './csv';

describe('parseCsv', () => {
  it('detects the delimiter and honours quoted fields', () => {
    const result = parseCsv('\uFEFFname;note\nwidget;"a;b"\n"say ""hi""";"line\nbreak"\n');
    expect(result.delimiter).toBe(';');
    expect(result.headers).toEqual(['name', 'note']);
    expect(result.rows).toEqual([
      ['widget', 'a;b'],
      ['say "hi"', 'line\nbreak']
    ]);
  });

  it('drops blank rows and handles CRLF without a trailing newline', () => {
    const result = parseCsv('a,b\r\n1,2\r\n,\r\n3,4');
    expect(result.rows).toEqual([
      ['1', '2'],
      ['3', '4']
    ]);
    expect(result.truncated).toBe(false);
  });

  it('flags truncation past the row limit', () => {
    expect(parseCsv('h\n1\n2\n3\n', { maxRows: 2 })).toMatchObject({ rows: [['1'], ['2']], truncated: true });
    expect(parseCsv('h\n1\n2\n\n', { maxRows: 2 })).toMatchObject({ rows: [['1'], ['2']], truncated: false });
  });

  it('uses a fixed delimiter when given', () => {
    expect(parseCsv('a\tb,c\n1\t2,3', { delimiter: ',' }).headers).toEqual(['a\tb', 'c']);
  });
});

describe('formatCsv', () => {
  it('quotes cells that need it', () => {
    expect(formatCsv(['a', 'b'], [['x,y', 'he said "hi"'], [null, 3], [true, undefined]])).toBe(
      'a,b\n"x,y","he said ""hi"""\n,3\ntrue,\n'
    );
  });
});

describe('normalizeHeader', () => {
  it('strips case, spaces and punctuation', () => {
    expect(normalizeHeader(' Quantity Sold_per-Day ')).toBe('quantitysoldperday');
  });
});
