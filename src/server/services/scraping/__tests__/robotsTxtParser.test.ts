import { describe, it, expect } from 'vitest';
import {
  RobotsTxtParser,
  isPathAllowed,
  parseRobotsTxt,
  pathMatches,
  selectGroup,
} from '../robotsTxtParser.js';
import { stubHttpClient } from '../../../__tests__/helpers/http.js';

const ROBOTS = `
# comment line
User-agent: *
Disallow: /private/
Allow: /private/public-page
Crawl-delay: 2

User-agent: DeepSearch-Bot
User-agent: other-bot
Disallow: /bots-only-blocked
Disallow:

Sitemap: https://example.org/sitemap.xml
`;

describe('parseRobotsTxt', () => {
  it('groups consecutive user-agent lines and skips sitemap lines', () => {
    const policy = parseRobotsTxt(ROBOTS);

    expect([...policy.groups.keys()]).toEqual(['*', 'deepsearch-bot', 'other-bot']);
    expect(policy.groups.get('*')).toEqual({
      crawlDelay: 2,
      rules: [
        { allow: false, pattern: '/private/' },
        { allow: true, pattern: '/private/public-page' },
      ],
    });
    expect(policy.groups.get('other-bot')?.rules).toEqual([{ allow: false, pattern: '/bots-only-blocked' }]);
    expect(Object.keys(policy)).toEqual(['groups']);
  });

  it('merges repeated groups for the same agent', () => {
    const policy = parseRobotsTxt('User-agent: a\nDisallow: /x\n\nUser-agent: a\nDisallow: /y\n');
    expect(policy.groups.get('a')?.rules.map((rule) => rule.pattern)).toEqual(['/x', '/y']);
  });
});

describe('selectGroup', () => {
  it('prefers the agent-specific group over *', () => {
    const policy = parseRobotsTxt(ROBOTS);
    expect(selectGroup(policy, 'DeepSearch-Bot/0.1 (+https://example.org)')?.rules).toEqual([
      { allow: false, pattern: '/bots-only-blocked' },
    ]);
  });

  it('falls back to * for unknown agents', () => {
    const policy = parseRobotsTxt(ROBOTS);
    expect(selectGroup(policy, 'SomethingElse/1.0')?.crawlDelay).toBe(2);
  });
});

describe('pathMatches', () => {
  it('supports * wildcards and $ anchors', () => {
    expect(pathMatches('/docs/file.pdf', '/*.pdf$')).toBe(true);
    expect(pathMatches('/docs/file.pdf?x=1', '/*.pdf$')).toBe(false);
    expect(pathMatches('/private/area', '/private')).toBe(true);
    expect(pathMatches('/public', '/private')).toBe(false);
  });
});

describe('isPathAllowed', () => {
  const rules = parseRobotsTxt(ROBOTS).groups.get('*');

  it('lets the longest matching rule win', () => {
    expect(isPathAllowed(rules, '/private/secret')).toBe(false);
    expect(isPathAllowed(rules, '/private/public-page')).toBe(true);
  });

  it('lets Allow win a tie of equal length', () => {
    const tied = parseRobotsTxt('User-agent: *\nDisallow: /page\nAllow: /page\n').groups.get('*');
    expect(isPathAllowed(tied, '/page')).toBe(true);
  });

  it('allows paths no rule matches', () => {
    expect(isPathAllowed(rules, '/news')).toBe(true);
    expect(isPathAllowed(undefined, '/anything')).toBe(true);
  });
});

describe('RobotsTxtParser', () => {
  it('fetches robots.txt once per origin and evaluates URLs', async () => {
    const { client, calls } = stubHttpClient(() => ({ status: 200, data: ROBOTS }));
    const parser = new RobotsTxtParser({ userAgent: 'SomeBot/1.0', httpClient: client });

    expect(await parser.isUrlAllowed('https://example.org/private/x')).toBe(false);
    expect(await parser.isUrlAllowed('https://example.org/open')).toBe(true);
    expect(await parser.getCrawlDelay('https://example.org')).toBe(2);
    expect(calls).toEqual(['https://example.org/robots.txt']);
  });

  it('treats a 404 as allow-all', async () => {
    const { client } = stubHttpClient(() => ({ status: 404, data: 'not found' }));
    const parser = new RobotsTxtParser({ userAgent: 'SomeBot/1.0', httpClient: client });
    expect(await parser.isUrlAllowed('https://example.org/private/x')).toBe(true);
  });

  it('fails open when robots.txt is unreachable', async () => {
    const { client } = stubHttpClient(() => {
      throw new Error('connect ECONNREFUSED');
    });
    const parser = new RobotsTxtParser({ userAgent: 'SomeBot/1.0', httpClient: client });
    expect(await parser.isUrlAllowed('https://down.example/private/x')).toBe(true);
    expect(await parser.getCrawlDelay('https://down.example')).toBeNull();
  });

  it('fails open on a 5xx answer', async () => {
    const { client } = stubHttpClient(() => ({ status: 503, data: 'unavailable' }));
    const parser = new RobotsTxtParser({ userAgent: 'SomeBot/1.0', httpClient: client });
    expect(await parser.isUrlAllowed('https://busy.example/private/x')).toBe(true);
  });

  it('does not fetch for getCrawlDelay alone', async () => {
    const { client, calls } = stubHttpClient(() => ({ status: 200, data: ROBOTS }));
    const parser = new RobotsTxtParser({ userAgent: 'SomeBot/1.0', httpClient: client });
    expect(await parser.getCrawlDelay('https://example.org')).toBeNull();
    expect(calls).toEqual([]);
  });
});
