import { InvalidParameterError } from '../src/errors';
import { PowerStream } from '../src/power-stream';

describe('PowerStream', () => {
  test('produces powers of 2 from n = 1', () => {
    const stream = new PowerStream(2, 10);
    const digits = [1, 2, 3, 4, 5].map(() => stream.next().digits);
    expect(digits).toEqual(['2', '4', '8', '16', '32']);
    expect(stream.index).toBe(5);
  });

  test('reports the index and value of each sample', () => {
    const stream = new PowerStream(3, 10);
    expect(stream.next()).toEqual({ index: 1, value: 3n, digits: '3' });
    expect(stream.next()).toEqual({ index: 2, value: 9n, digits: '9' });
  });

  test('starts from an arbitrary index', () => {
    const stream = new PowerStream(2, 10, 10);
    expect(stream.index).toBe(9);
    expect(stream.next()).toEqual({ index: 10, value: 1024n, digits: '1024' });
  });

  test('renders in the requested base', () => {
    const stream = new PowerStream(2, 2, 3);
    expect(stream.next().digits).toBe('1000');
    expect(stream.next().digits).toBe('10000');
  });

  test('grows without bound', () => {
    const stream = new PowerStream(2, 10);
    let last = stream.next();
    for (let n = 2; n <= 500; n++) {
      last = stream.next();
    }
    expect(last.index).toBe(500);
    expect(last.value).toBe(2n ** 500n);
    expect(last.digits).toBe((2n ** 500n).toString());
    expect(last.digits).toHaveLength(151);
  });

  test('restarting mid-way continues the same sequence', () => {
    const full = new PowerStream(7, 13);
    for (let n = 1; n < 40; n++) full.next();
    const resumed = new PowerStream(7, 13, 40);
    expect(resumed.next()).toEqual(full.next());
  });

  test('rejects bad parameters', () => {
    expect(() => new PowerStream(1, 10)).toThrow(InvalidParameterError);
    expect(() => new PowerStream(2, 1)).toThrow(InvalidParameterError);
    expect(() => new PowerStream(2, 10, 0)).toThrow(/Invalid start 0/);
  });
});
