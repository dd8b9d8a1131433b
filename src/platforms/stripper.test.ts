import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { loadHtml } from '../rewriter.js';
import { htmlPage } from '../testing/fake-site.js';
import { PLATFORMS, createStripper, isPlatform } from './index.js';
import { parseBadgeRules } from './rules.js';

describe('BadgeStripper', () => {
  it('removes the Framer badge, injects hiding rules and keeps long prose', () => {
    const prose = 'This portfolio was made with Framer and then heavily customised by our own team.';
    const $ = loadHtml(
      htmlPage(
        'Studio',
        `<div class="framer-badge">Made with Framer</div><p>${prose}</p>` +
          '<a href="https://www.framer.com/" target="_blank">Made in Framer</a>' +
          '<a href="https://framer.com/pricing">Pricing</a>'
      )
    );
    createStripper('framer').stripBadge($);

    expect($('.framer-badge')).toHaveLength(0);
    expect($('head style').text()).toContain('#__framer-badge-container { display: none !important; }');
    expect($('p').text()).toBe(prose);
    expect($('a').map((_, el) => $(el).text()).get()).toEqual(['Pricing']);
  });

  it('removes short promotional text only', () => {
    const $ = loadHtml(
      htmlPage(
        'Shop',
        '<span>Powered by Shopify</span>' +
          '<p>Powered by Shopify, our checkout handles payments securely for customers worldwide.</p>'
      )
    );
    createStripper('shopify').stripBadge($);

    expect($('span')).toHaveLength(0);
    expect($('p')).toHaveLength(1);
  });

  it('drops a matching generator meta tag', () => {
    const $ = loadHtml(
      htmlPage(
        'Blog',
        '<p>Hello</p>',
        '<meta name="generator" content="WordPress 6.4"><meta name="generator" content="Hugo">'
      )
    );
    createStripper('wordpress').stripBadge($);

    expect($('meta[name="generator"]').map((_, el) => $(el).attr('content')).get()).toEqual(['Hugo']);
  });

  it('removes badge scripts', () => {
    const $ = loadHtml(
      htmlPage('App', '<main>App</main><script src="https://replit.com/public/js/replit-badge-v2.js"></script>')
    );
    createStripper('replit').stripBadge($);
    expect($('script')).toHaveLength(0);
    expect($('main').text()).toBe('App');
  });

  it('prepends the hiding rules to a fragment without head or body', () => {
    const $ = loadHtml('<div class="bolt-badge">Made in Bolt</div><p>Hi</p>');
    createStripper('bolt').stripBadge($);

    expect($.root().children().first().is('style')).toBe(true);
    expect($('.bolt-badge')).toHaveLength(0);
    expect($('p').text()).toBe('Hi');
  });

  it('loads rules for every platform', () => {
    for (const platform of PLATFORMS) {
      const $ = loadHtml(htmlPage('Site', '<h1>Welcome</h1>'));
      const stripper = createStripper(platform);
      stripper.stripBadge($);

      expect(stripper.platform).toBe(platform);
      expect($('h1').text()).toBe('Welcome');
      expect($('head style')).toHaveLength(platform === 'general' ? 0 : 1);
    }
  });

  it('leaves the document untouched for general sites', () => {
    const html = htmlPage('Site', '<div class="framer-badge">Made with Framer</div>');
    const $ = loadHtml(html);
    const before = $.html();
    createStripper('general').stripBadge($);
    expect($.html()).toBe(before);
  });
});

describe('platform rules', () => {
  it('recognizes supported platforms', () => {
    expect(isPlatform('framer')).toBe(true);
    expect(isPlatform('general')).toBe(true);
    expect(isPlatform('myspace')).toBe(false);
  });

  it('rejects malformed rule entries', () => {
    expect(() => parseBadgeRules('broken', { label: 1 })).toThrow(ConfigurationError);
    expect(() => parseBadgeRules('broken', { label: 'Broken', domains: 'x' })).toThrow(
      '"domains" must be a list of strings'
    );
  });

  it('lowercases phrases and keywords', () => {
    const rules = parseBadgeRules('demo', {
      label: 'Demo',
      domains: ['demo.test'],
      hideSelectors: [],
      removeSelectors: [],
      linkKeywords: ['Made'],
      textPhrases: ['Made With Demo']
    });
    expect(rules.linkKeywords).toEqual(['made']);
    expect(rules.textPhrases).toEqual(['made with demo']);
    expect(rules.generatorKeyword).toBeUndefined();
  });
});
