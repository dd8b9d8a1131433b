import type { CheerioAPI } from 'cheerio';
import { textClean } from '../utils.js';
import type { BadgeRules } from './rules.js';

const TEXT_BADGE_MAX_LENGTH = 50;

export interface PlatformStripper {
  readonly platform: string;
  readonly label: string;
  stripBadge($: CheerioAPI): CheerioAPI;
}

export function badgeStyleBlock(rules: BadgeRules): string {
  const lines = rules.hideSelectors.map((s) => `${s} { display: none !important; }`);
  return `<style>\n${lines.join('\n')}\n</style>`;
}

/** Hides, then removes, the markup one hosting platform injects to advertise itself. */
export class BadgeStripper implements PlatformStripper {
  constructor(
    readonly platform: string,
    private rules: BadgeRules
  ) {}

  get label(): string {
    return this.rules.label;
  }

  stripBadge($: CheerioAPI): CheerioAPI {
    this.injectHidingCss($);

    for (const selector of this.rules.removeSelectors) {
      $(selector).remove();
    }

    const generator = this.rules.generatorKeyword;
    if (generator) {
      $('meta[name="generator"]').each((_, el) => {
        if (($(el).attr('content') ?? '').toLowerCase().includes(generator)) $(el).remove();
      });
    }

    $('a[href]').each((_, el) => {
      const href = $(el).attr('href') ?? '';
      if (!this.rules.domains.some((d) => href.includes(d))) return;
      const text = $(el).text().toLowerCase();
      if (this.rules.linkKeywords.some((k) => text.includes(k))) $(el).remove();
    });

    $('a, button, div, span, p').each((_, el) => {
      const text = textClean($(el).text()).toLowerCase();
      if (!text || text.length >= TEXT_BADGE_MAX_LENGTH) return;
      if (this.rules.textPhrases.some((p) => text.includes(p))) $(el).remove();
    });

    return $;
  }

  private injectHidingCss($: CheerioAPI) {
    const style = badgeStyleBlock(this.rules);
    const head = $('head').first();
    if (head.length) {
      head.append(style);
      return;
    }
    const body = $('body').first();
    if (body.length) {
      body.prepend(style);
      return;
    }
    $.root().prepend(style);
  }
}

export class GeneralStripper implements PlatformStripper {
  readonly platform = 'general';
  readonly label = 'General';

  stripBadge($: CheerioAPI): CheerioAPI {
    return $;
  }
}
