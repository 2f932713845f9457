import { describe, it, expect } from 'vitest';
import {
  DEFAULT_URLS,
  careerPageUrl,
  isValidBattletag,
  normalizeBattletag,
  profilePageUrl,
  profileUpdateUrl,
} from './urls';

describe('normalizeBattletag', () => {
  it('should replace the separator with a dash', () => {
    expect(normalizeBattletag('Foo#1234')).toBe('Foo-1234');
  });

  it('should replace every # character', () => {
    expect(normalizeBattletag('a#b#1')).toBe('a-b-1');
  });

  it('should leave dashed battletags unchanged', () => {
    expect(normalizeBattletag('Foo-1234')).toBe('Foo-1234');
  });
});

describe('URL templates', () => {
  it('should build the career page URL', () => {
    expect(careerPageUrl(DEFAULT_URLS, 'Foo#1234', 'eu')).toBe(
      'https://playoverwatch.com/en-gb/career/pc/eu/Foo-1234'
    );
  });

  it('should build the profile page URL with the extra suffix', () => {
    expect(profilePageUrl(DEFAULT_URLS, 'Foo#1234', 'us', '/heroes')).toBe(
      'https://masteroverwatch.com/profile/pc/us/Foo-1234/heroes'
    );
  });

  it('should build the profile page URL without a suffix', () => {
    expect(profilePageUrl(DEFAULT_URLS, 'Foo#1234', 'kr')).toBe(
      'https://masteroverwatch.com/profile/pc/kr/Foo-1234'
    );
  });

  it('should build the update URL', () => {
    expect(profileUpdateUrl(DEFAULT_URLS, 'Foo#1234', 'eu')).toBe(
      'https://masteroverwatch.com/profile/pc/eu/Foo-1234/update'
    );
  });

  it('should use configured bases', () => {
    const urls = { blizzardBase: 'http://career.test', moBase: 'http://stats.test' };

    expect(careerPageUrl(urls, 'Foo#1234', 'us')).toBe('http://career.test/career/pc/us/Foo-1234');
    expect(profileUpdateUrl(urls, 'Foo#1234', 'us')).toBe(
      'http://stats.test/profile/pc/us/Foo-1234/update'
    );
  });

  it('should never leave a # in any templated URL', () => {
    const urls = [
      careerPageUrl(DEFAULT_URLS, 'Foo#1234', 'eu'),
      profilePageUrl(DEFAULT_URLS, 'Foo#1234', 'eu', '?mode=quick'),
      profileUpdateUrl(DEFAULT_URLS, 'Foo#1234', 'eu'),
    ];

    urls.forEach((url) => {
      expect(url).toContain('/Foo-1234');
      expect(url).not.toContain('#');
    });
  });
});

describe('isValidBattletag', () => {
  it('should accept hash and dash separators', () => {
    expect(isValidBattletag('Foo#1234')).toBe(true);
    expect(isValidBattletag('Foo-1234')).toBe(true);
  });

  it('should accept non-latin names', () => {
    expect(isValidBattletag('테스트#31337')).toBe(true);
  });

  it('should reject missing discriminators and path characters', () => {
    expect(isValidBattletag('Foo')).toBe(false);
    expect(isValidBattletag('Foo#')).toBe(false);
    expect(isValidBattletag('../etc-1')).toBe(false);
    expect(isValidBattletag('Foo Bar#1')).toBe(false);
  });

  it('should reject overly long input', () => {
    expect(isValidBattletag(`${'a'.repeat(64)}#1`)).toBe(false);
  });
});
