import { describe, it, expect } from '@jest/globals';
import { detectRowScheme, detectVenueSeatStructure } from '../scheme-detector';
import { seats } from '../../../../../test/support/fixtures';

describe('Numbering Scheme Detection', () => {
  it('should classify rows by their dominant gap', () => {
    expect(detectRowScheme([1, 2, 3, 4, 5])).toBe('consecutive');
    expect(detectRowScheme([1, 3, 5, 7])).toBe('odd_even');
    expect(detectRowScheme([1, 4, 9])).toBe('unknown');
    expect(detectRowScheme([7])).toBe('unknown');
  });

  it('should tolerate a minority of gaps', () => {
    // gaps: 1,1,1,5 -> 75% ones
    expect(detectRowScheme([1, 2, 3, 4, 9])).toBe('consecutive');
  });

  it('should take the majority across rows', () => {
    const detection = detectVenueSeatStructure([
      ...seats('A', [1, 3, 5, 7]),
      ...seats('B', [2, 4, 6]),
      ...seats('C', [1, 2, 3]),
    ]);

    expect(detection).toEqual({ scheme: 'odd_even', consecutiveRows: 1, oddEvenRows: 2, unknownRows: 0 });
  });

  it('should fall back to consecutive on a tie', () => {
    const detection = detectVenueSeatStructure([...seats('A', [1, 3]), ...seats('B', [1, 2])]);
    expect(detection.scheme).toBe('consecutive');
  });
});
