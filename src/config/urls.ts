/**
 * URL templates for the career and stats sites
 *
 * The path layouts must match the target sites exactly.
 *
 * @module config/urls
 */

import type { Region } from './regions';

export interface UrlConfig {
  /** Career site base, without a trailing slash */
  blizzardBase: string;
  /** Stats site base, without a trailing slash */
  moBase: string;
}

export const DEFAULT_URLS: UrlConfig = {
  blizzardBase: 'https://playoverwatch.com/en-gb',
  moBase: 'https://masteroverwatch.com',
};

/**
 * Name, then `#` or `-`, then the numeric discriminator
 */
const BATTLETAG_PATTERN = /^[\p{L}\p{N}_]+[#-]\d+$/u;

export function isValidBattletag(battletag: string): boolean {
  return battletag.length <= 64 && BATTLETAG_PATTERN.test(battletag);
}

/**
 * Replace every `#` with `-` for use as a path segment
 */
export function normalizeBattletag(battletag: string): string {
  return battletag.replaceAll('#', '-');
}

/**
 * Existence-check page on the career site
 */
export function careerPageUrl(urls: UrlConfig, battletag: string, region: Region): string {
  return `${urls.blizzardBase}/career/pc/${region}/${normalizeBattletag(battletag)}`;
}

/**
 * Full profile page on the stats site. `extra` is appended verbatim.
 */
export function profilePageUrl(
  urls: UrlConfig,
  battletag: string,
  region: Region,
  extra = ''
): string {
  return `${urls.moBase}/profile/pc/${region}/${normalizeBattletag(battletag)}${extra}`;
}

export function profileUpdateUrl(urls: UrlConfig, battletag: string, region: Region): string {
  return `${urls.moBase}/profile/pc/${region}/${normalizeBattletag(battletag)}/update`;
}
