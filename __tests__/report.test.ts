import { LimitSearchResult } from '../src/limit-search';
import { Logger } from '../src/logger';
import { describeLastAbsence, printLimitResult, printSearchSummary } from '../src/report';
import { SearchResult } from '../src/types';

function mockLogger(): Record<keyof Logger, jest.Mock> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('report', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  const result: SearchResult = {
    universe: ['0', '1'],
    counts: [2, 2],
    start: 1,
    stop: 4,
    lastAnyAbsentIndex: 4,
    stats: { samples: 4, rate: 2.7, elapsedMs: 1500 },
  };

  test('prints the summary and logs the duration at info level', () => {
    const logger = mockLogger();
    printSearchSummary(result, logger);

    expect(log.mock.calls).toEqual([
      ['\nSearched n=1..4 (4 samples this run)'],
      ['Total non-matches: 4'],
      ['Mean non-matches per sequence: 2.00 (std 0.00)'],
      ['Outlier values from average matches:'],
    ]);
    expect(logger.info).toHaveBeenCalledWith('Search took 1.5 seconds');
  });

  test('describes the last absence, or that there was none', () => {
    expect(describeLastAbsence(7)).toBe('Last non-matching power was 7');
    expect(describeLastAbsence(0)).toBe('No power lacked any sequence');
  });

  test('limit results say none when no power missed the sequence', () => {
    const logger = mockLogger();
    const limit: LimitSearchResult = { hitIndices: [50, 51], lastIndex: 51, lastNonHitIndex: 0 };
    printLimitResult(limit, 200, logger);

    expect(log.mock.calls).toEqual([['Searched to n=51, last non-apocalypse n was none'], ['Hits found: 2']]);
    expect(logger.info).toHaveBeenCalledWith('Search took <1 second');
  });

  test('limit results name the last miss', () => {
    printLimitResult({ hitIndices: [4], lastIndex: 4, lastNonHitIndex: 3 }, 0, mockLogger());
    expect(log).toHaveBeenCalledWith('Searched to n=4, last non-apocalypse n was n=3');
  });
});
