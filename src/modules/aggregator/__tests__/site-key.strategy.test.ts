/**
 * Site Key Strategy Tests
 */

import { getSiteKeyStrategy, idPrefixStrategy, urlPathSegmentStrategy } from '../site-key.strategy';

describe('site key strategies', () => {
  it('should take the id prefix before the first dash', () => {
    expect(idPrefixStrategy.deriveKey({ id: '12-3', url: '' })).toBe('12');
    expect(idPrefixStrategy.deriveKey({ id: 'solo', url: '' })).toBe('solo');
    expect(idPrefixStrategy.deriveKey({ id: '', url: '' })).toBeNull();
  });

  it('should take the last URL path segment', () => {
    expect(urlPathSegmentStrategy.deriveKey({ id: '', url: 'https://host/school/ais-tokyo' })).toBe('ais-tokyo');
    expect(urlPathSegmentStrategy.deriveKey({ id: '', url: 'https://host/school/' })).toBeNull();
    expect(urlPathSegmentStrategy.deriveKey({ id: '1-1', url: '' })).toBeNull();
  });

  it('should look strategies up by name', () => {
    expect(getSiteKeyStrategy('id-prefix')).toBe(idPrefixStrategy);
    expect(getSiteKeyStrategy('url-path-segment')).toBe(urlPathSegmentStrategy);
    expect(() => getSiteKeyStrategy('nope')).toThrow(
      'Unknown site key strategy "nope". Expected one of: id-prefix, url-path-segment'
    );
  });
});
