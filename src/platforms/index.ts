import { ConfigurationError } from '../errors.js';
import { loadBadgeRules } from './rules.js';
import { BadgeStripper, GeneralStripper, type PlatformStripper } from './stripper.js';

export const PLATFORMS = [
  'framer',
  'webflow',
  'wordpress',
  'wix',
  'shopify',
  'bolt',
  'lovable',
  'gumroad',
  'replit',
  'squarespace',
  'notion',
  'rocket',
  'general'
] as const;

export type Platform = (typeof PLATFORMS)[number];

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((p) => p === value);
}

export function createStripper(platform: Platform): PlatformStripper {
  if (platform === 'general') return new GeneralStripper();
  const rules = loadBadgeRules().get(platform);
  if (!rules) throw new ConfigurationError(`no badge rules defined for platform "${platform}"`);
  return new BadgeStripper(platform, rules);
}

export type { PlatformStripper } from './stripper.js';
