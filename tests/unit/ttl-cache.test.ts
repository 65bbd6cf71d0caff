import { TtlCache } from '../../src/lib/ttl-cache';

describe('TtlCache', () => {
  let clock: number;
  let cache: TtlCache<string, string>;

  beforeEach(() => {
    clock = 1_000;
    cache = new TtlCache(500, () => clock);
  });

  it('should return values inside their time window', () => {
    cache.set('P1', 'https://dav.test/a/');
    clock += 499;

    expect(cache.get('P1')).toBe('https://dav.test/a/');
  });

  it('should expire values once the window has passed', () => {
    cache.set('P1', 'https://dav.test/a/');
    clock += 500;

    expect(cache.get('P1')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should restart the window when a value is replaced', () => {
    cache.set('P1', 'old');
    clock += 400;
    cache.set('P1', 'new');
    clock += 400;

    expect(cache.get('P1')).toBe('new');
  });

  it('should drop entries on delete and clear', () => {
    cache.set('P1', 'a');
    cache.set('P2', 'b');

    expect(cache.delete('P1')).toBe(true);
    expect(cache.get('P1')).toBeUndefined();

    cache.clear();
    expect(cache.get('P2')).toBeUndefined();
  });
});
