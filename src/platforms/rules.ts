import fs from 'node:fs';
import { ConfigurationError } from '../errors.js';

export type BadgeRules = {
  label: string;
  domains: string[]; // link targets containing one of these belong to the platform
  hideSelectors: string[]; // injected as display:none rules
  removeSelectors: string[]; // deleted from the DOM
  linkKeywords: string[]; // promotional words in the text of a platform link
  textPhrases: string[]; // short promotional text, removed when under 50 characters
  generatorKeyword?: string; // <meta name="generator"> content to drop
};

const RULES_FILE = new URL('../../data/platforms.json', import.meta.url);

let cached: Map<string, BadgeRules> | null = null;

function field(obj: object, key: string): unknown {
  return Object.getOwnPropertyDescriptor(obj, key)?.value;
}

function stringList(obj: object, key: string, platform: string): string[] {
  const value = field(obj, key);
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigurationError(`platform rules for "${platform}": "${key}" must be a list of strings`);
  }
  return value;
}

export function parseBadgeRules(platform: string, raw: unknown): BadgeRules {
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigurationError(`platform rules for "${platform}" must be an object`);
  }
  const label = field(raw, 'label');
  const generatorKeyword = field(raw, 'generatorKeyword');
  if (typeof label !== 'string') {
    throw new ConfigurationError(`platform rules for "${platform}": "label" must be a string`);
  }
  if (generatorKeyword !== undefined && typeof generatorKeyword !== 'string') {
    throw new ConfigurationError(`platform rules for "${platform}": "generatorKeyword" must be a string`);
  }
  return {
    label,
    domains: stringList(raw, 'domains', platform),
    hideSelectors: stringList(raw, 'hideSelectors', platform),
    removeSelectors: stringList(raw, 'removeSelectors', platform),
    linkKeywords: stringList(raw, 'linkKeywords', platform).map((k) => k.toLowerCase()),
    textPhrases: stringList(raw, 'textPhrases', platform).map((p) => p.toLowerCase()),
    generatorKeyword: generatorKeyword?.toLowerCase()
  };
}

export function loadBadgeRules(): Map<string, BadgeRules> {
  if (cached) return cached;
  const parsed: unknown = JSON.parse(fs.readFileSync(RULES_FILE, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null) {
    throw new ConfigurationError('platform rules file must contain an object');
  }
  const rules = new Map<string, BadgeRules>();
  for (const [platform, raw] of Object.entries(parsed)) {
    rules.set(platform, parseBadgeRules(platform, raw));
  }
  cached = rules;
  return rules;
}
