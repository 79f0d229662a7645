import { describe, expect, it } from 'vitest';
import { ComparisonEngine, ReconcileError, createComparisonEngine } from '../src/index.js';
import { HEADER, createTestLogger, tableOf, thrownBy } from './helpers.js';

function labeled(label: string, table: string[][]) {
  return { label, table };
}

const rowsA = [
  ['d1', 'p1', 'PMC1', 'T1'],
  ['d2', 'p2', 'PMC2', 'T2'],
  ['d3', 'p3', 'PMC3', 'T3'],
];

describe('ComparisonEngine', () => {
  it('reports nothing for identical tables', () => {
    const engine = new ComparisonEngine();
    const result = engine.compare({
      a: labeled('a.csv', tableOf(...rowsA)),
      b: labeled('b.csv', tableOf(...rowsA)),
      original: labeled('o.csv', tableOf(...rowsA)),
    });

    expect(result.report.differences).toEqual([]);
    expect(result.report.suspicious).toHaveLength(1);
    expect(result.suspicious).toEqual([]);
    expect(result.summary).toEqual({
      originalRowCount: 4,
      aRowCount: 4,
      bRowCount: 4,
      comparedRowCount: 3,
      processedCount: 3,
      suspiciousCount: 0,
      differenceCount: 0,
    });
  });

  it('treats an unprefixed PMCID as equal and reports the title typo', () => {
    const result = createComparisonEngine().compare({
      a: labeled('a.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
      b: labeled('b.csv', tableOf(['d1', 'p1', '1', 'T1-typo'])),
      original: labeled('o.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
    });

    expect([...result.differences]).toEqual([{ column: 3, row: 1, values: ['T1', 'T1-typo'] }]);
    expect(result.suspicious).toEqual([]);
    expect(result.report.differences).toEqual([
      ['Row #', 'a.csv Article title', 'b.csv Article title', 'o.csv PMCID', 'o.csv PMID', 'o.csv DOI', 'o.csv Article title'],
      ['2', 'T1', 'T1-typo', 'PMC1', 'p1', 'd1', 'T1'],
      [],
    ]);
  });

  it('skips cell comparison for rows whose identifiers all disagree', () => {
    const result = new ComparisonEngine().compare({
      a: labeled('a.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'], ['d2', 'p2', 'PMC2', 'T2'])),
      b: labeled('b.csv', tableOf(['x1', 'y1', 'PMC8', 'Other'], ['d2', 'p2', 'PMC2', 'T2'])),
      original: labeled('o.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'], ['d2', 'p2', 'PMC2', 'T2'])),
    });

    expect(result.differences.size).toBe(0);
    expect(result.suspicious).toEqual([
      {
        row: 1,
        values: {
          PMCID: ['PMC1', 'PMC8'],
          PMID: ['p1', 'y1'],
          DOI: ['d1', 'x1'],
          title: ['T1', 'Other'],
        },
      },
    ]);
    expect(result.report.suspicious[1]).toEqual(['1', 'PMC1', 'PMC8', 'p1', 'y1', 'd1', 'x1', 'T1', 'Other']);
    expect(result.summary.processedCount).toBe(1);
    expect(result.summary.suspiciousCount).toBe(1);
  });

  it('fails when A has more rows than B', () => {
    const many = Array.from({ length: 9 }, (_, i) => [`d${i}`, `p${i}`, `PMC${i}`, `T${i}`]);
    const error = thrownBy(() =>
      new ComparisonEngine().compare({
        a: labeled('a.csv', tableOf(...many)),
        b: labeled('b.csv', tableOf(...many.slice(0, 7))),
        original: labeled('o.csv', tableOf(...many)),
      })
    );

    expect(error).toBeInstanceOf(ReconcileError);
    expect(error).toMatchObject({
      code: 'ROW_COUNT_EXCEEDED',
      context: { tables: ['a.csv', 'b.csv'], lengths: [10, 8] },
    });
  });

  it('compares up to the end of A when B is longer', () => {
    const logger = createTestLogger();
    const many = Array.from({ length: 9 }, (_, i) => [`d${i}`, `p${i}`, `PMC${i}`, `T${i}`]);
    const b = many.map((row, i) => (i === 8 ? [row[0] ?? '', row[1] ?? '', row[2] ?? '', 'changed'] : row));

    const result = new ComparisonEngine(logger).compare({
      a: labeled('a.csv', tableOf(...many.slice(0, 7))),
      b: labeled('b.csv', tableOf(...b)),
      original: labeled('o.csv', tableOf(...many)),
    });

    expect(result.summary.comparedRowCount).toBe(7);
    expect(result.summary.processedCount).toBe(7);
    expect(result.differences.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0]?.[0]).toBe(
      'Sheets have a different number of rows. Comparison will only go as far as the end of sheet a.csv, ' +
        'the rest of the rows in sheet b.csv will be ignored.'
    );
  });

  it('requires the identifying columns in the original', () => {
    const error = thrownBy(() =>
      new ComparisonEngine().compare({
        a: labeled('a.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
        b: labeled('b.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
        original: labeled('o.csv', [['DOI', 'PMID', 'PMCID', 'Title'], ['d1', 'p1', 'PMC1', 'T1']]),
      })
    );

    expect(error).toMatchObject({
      code: 'MISSING_REQUIRED_COLUMN',
      context: { column: 'Article title', tables: ['o.csv', 'o.csv'] },
    });
  });

  it('drops non-whitelisted columns before comparing', () => {
    const logger = createTestLogger();
    const a = [[...HEADER, 'Notes'], ['d1', 'p1', 'PMC1', 'T1', 'first']];
    const b = [[...HEADER, 'Notes'], ['d1', 'p1', 'PMC1', 'T1', 'second']];

    const result = new ComparisonEngine(logger).compare({
      a: labeled('a.csv', a),
      b: labeled('b.csv', b),
      original: labeled('o.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
      settings: { whitelist: HEADER },
    });

    expect(result.differences.size).toBe(0);
    expect(result.headers.a).toEqual(HEADER);
    expect(logger.info).toHaveBeenCalledWith("Deleted column 'Notes' from a.csv, not in whitelist.");
    expect(logger.info).toHaveBeenCalledWith("Deleted column 'Notes' from b.csv, not in whitelist.");
    expect(a[0]).toEqual([...HEADER, 'Notes']);
  });

  it('fails when the whitelist removes an identifying column', () => {
    const error = thrownBy(() =>
      new ComparisonEngine().compare({
        a: labeled('a.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
        b: labeled('b.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
        original: labeled('o.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
        settings: { whitelist: ['DOI', 'PMID', 'PMCID'] },
      })
    );

    expect(error).toMatchObject({ code: 'MISSING_REQUIRED_COLUMN', context: { column: 'Article title' } });
  });

  it('accepts declared header synonyms and labels B with its own name', () => {
    const a = [[...HEADER, 'Author'], ['d1', 'p1', 'PMC1', 'T1', 'Smith']];
    const b = [[...HEADER, 'Authors'], ['d1', 'p1', 'PMC1', 'T1', 'Smyth']];

    const result = new ComparisonEngine().compare({
      a: labeled('a.csv', a),
      b: labeled('b.csv', b),
      original: labeled('o.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
      settings: { synonymGroups: [['Author', 'Authors']] },
    });

    expect(result.report.differences[0]?.slice(0, 3)).toEqual(['Row #', 'a.csv Author', 'b.csv Authors']);
    expect(result.differences.get(4, 1)).toEqual(['Smith', 'Smyth']);
  });

  it('rejects undeclared header differences', () => {
    const error = thrownBy(() =>
      new ComparisonEngine().compare({
        a: labeled('a.csv', [[...HEADER, 'Author'], ['d1', 'p1', 'PMC1', 'T1', 'Smith']]),
        b: labeled('b.csv', [[...HEADER, 'Authors'], ['d1', 'p1', 'PMC1', 'T1', 'Smith']]),
        original: labeled('o.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
      })
    );

    expect(error).toMatchObject({
      code: 'UNRECONCILED_HEADER_DIFFERENCE',
      context: { column: 'Author', otherColumn: 'Authors', position: 4 },
    });
  });

  it('applies configured column comparators', () => {
    const input = {
      a: labeled('a.csv', tableOf(['d1', 'p1', 'PMC1', 'Title'])),
      b: labeled('b.csv', tableOf(['d1', 'p1', 'PMC1', 'title'])),
      original: labeled('o.csv', tableOf(['d1', 'p1', 'PMC1', 'Title'])),
    };

    expect(new ComparisonEngine().compare(input).differences.size).toBe(0);
    expect(
      new ComparisonEngine()
        .compare({ ...input, settings: { columnComparators: { 'Article title': 'exact' } } })
        .differences.get(3, 1)
    ).toEqual(['Title', 'title']);
  });

  it('logs the headers when asked to', () => {
    const logger = createTestLogger();

    new ComparisonEngine(logger).compare({
      a: labeled('a.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
      b: labeled('b.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
      original: labeled('o.csv', tableOf(['d1', 'p1', 'PMC1', 'T1'])),
      settings: { printHeaders: true },
    });

    expect(logger.info).toHaveBeenCalledWith('o.csv header:');
    expect(logger.info).toHaveBeenCalledWith('"DOI","PMID","PMCID","Article title"');
  });
});
