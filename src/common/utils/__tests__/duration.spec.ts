import {
  InvalidDurationError,
  assertDuration,
  parseDuration,
} from '../duration';

describe('parseDuration', () => {
  it('should parse hour, minute and day durations', () => {
    expect(parseDuration('24h')).toBe(24 * 60 * 60 * 1000);
    expect(parseDuration('30m')).toBe(30 * 60 * 1000);
    expect(parseDuration('7d')).toBe(7 * 24 * 60 * 60 * 1000);
  });

  it('should parse compound durations', () => {
    expect(parseDuration('1h30m')).toBe(5400000);
    expect(parseDuration('2h45m30s')).toBe(9930000);
    expect(parseDuration('1m500ms')).toBe(60500);
    expect(parseDuration('8h0m0s')).toBe(8 * 60 * 60 * 1000);
  });

  it('should parse sub-millisecond segments', () => {
    expect(parseDuration('1s1500us')).toBeCloseTo(1001.5);
  });

  it('should reject unparseable values', () => {
    expect(() => parseDuration('forever')).toThrow(InvalidDurationError);
    expect(() => parseDuration('1h30x')).toThrow('Invalid duration: "1h30x"');
    expect(() => parseDuration('')).toThrow('Invalid duration: ""');
  });

  it('should reject negative durations', () => {
    expect(() => parseDuration('-1h')).toThrow(InvalidDurationError);
    expect(() => parseDuration('-1h30m')).toThrow(InvalidDurationError);
  });

  it('should only accept zero when allowed', () => {
    expect(() => parseDuration('0')).toThrow(InvalidDurationError);
    expect(parseDuration('0', { allowZero: true })).toBe(0);
  });
});

describe('assertDuration', () => {
  it('should pass positive finite values through', () => {
    expect(assertDuration(3600000, '1h')).toBe(3600000);
  });

  it('should reject non-finite and non-positive values', () => {
    expect(() => assertDuration(Infinity, 'Infinity')).toThrow(
      'Invalid duration: "Infinity"',
    );
    expect(() => assertDuration(NaN, 'NaN')).toThrow(InvalidDurationError);
    expect(() => assertDuration(0, '0')).toThrow(InvalidDurationError);
    expect(() => assertDuration(-1, '-1')).toThrow(InvalidDurationError);
  });
});
