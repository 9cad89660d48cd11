import { CacheManager } from './cache';

describe('CacheManager', () => {
  let cache: CacheManager;

  beforeEach(() => {
    cache = new CacheManager({ checkperiod: 0 });
  });

  afterEach(() => {
    cache.close();
  });

  it('should build upper-cased keys with sorted params', () => {
    expect(cache.generateKey('aapl', 'income_statement', { period: 'annual', limit: 2 })).toBe(
      'AAPL:income_statement:limit:2:period:annual'
    );
    expect(cache.generateKey('msft', 'quote')).toBe('MSFT:quote');
  });

  it('should return stored values and null on a miss', () => {
    cache.set('AAPL:quote', { pe: 30 }, 'quote');

    expect(cache.get<{ pe: number }>('AAPL:quote')).toEqual({ pe: 30 });
    expect(cache.get('MSFT:quote')).toBeNull();
  });

  it('should track hits and misses', () => {
    cache.set('AAPL:quote', 1, 'quote');
    cache.get('AAPL:quote');
    cache.get('MSFT:quote');

    expect(cache.getStats()).toEqual({ keys: 1, hits: 1, misses: 1, hitRate: 0.5 });
  });

  it('should delete and flush entries', () => {
    cache.set('AAPL:quote', 1);
    cache.set('MSFT:quote', 2);

    expect(cache.delete('AAPL:quote')).toBe(true);
    expect(cache.delete('AAPL:quote')).toBe(false);

    cache.flush();
    expect(cache.get('MSFT:quote')).toBeNull();
  });
});
