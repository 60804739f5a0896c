import { describe, it, expect } from 'vitest';
import { renderReport } from '../report';

const sizes = { reference: 2, canonical: 2, common: 2 };

describe('renderReport', () => {
  it('renders an empty intersection', () => {
    expect(
      renderReport(
        { outcome: 'no-common-timestamps', sizes: { reference: 0, canonical: 4, common: 0 } },
        { dropLast: false }
      )
    ).toEqual(['No common timestamps to compare.']);
  });

  it('renders a match', () => {
    expect(renderReport({ outcome: 'match', sizes, sizeMismatch: false }, { dropLast: false })).toEqual([
      'OK: data matches.',
    ]);
  });

  it('renders null cells, timestamps and unknown lines', () => {
    const lines = renderReport(
      {
        outcome: 'divergent',
        sizes,
        sizeMismatch: false,
        rows: [
          {
            openTime: new Date(1704067200000),
            position: 2,
            line: null,
            differences: [
              { column: 'volume', reference: null, canonical: 12.5 },
              { column: 'close_time', reference: new Date(1704081599999), canonical: null },
            ],
          },
        ],
      },
      { dropLast: true }
    );

    expect(lines).toEqual([
      'Differences found in 1 rows.',
      '',
      'Row 2 (timestamp 2024-01-01 00:00:00, canonical line n/a):',
      '  volume: reference=null canonical=12.5',
      '  close_time: reference=2024-01-01 03:59:59.999 canonical=null',
    ]);
  });
});
