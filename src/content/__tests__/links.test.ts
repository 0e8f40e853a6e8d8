import { checkLinkTarget, isExternalLink } from '../links';

describe('checkLinkTarget', () => {
  it.each([
    'https://example.com/a?b=c#d',
    'http://localhost:4000/',
    '/2019/02/11/living-with-optional.html',
    '../img/a.png',
    '#section',
    'mailto:someone@example.com',
    '//cdn.example.com/lib.js',
  ])('accepts %s', (target) => {
    expect(checkLinkTarget(target)).toBeNull();
  });

  it('rejects an empty target', () => {
    expect(checkLinkTarget('')).toBe('link target is empty');
    expect(checkLinkTarget('  ')).toBe('link target is empty');
  });

  it('rejects whitespace unless the target was enclosed in angle brackets', () => {
    expect(checkLinkTarget('foo bar.html')).toBe('link target "foo bar.html" contains whitespace');
    expect(checkLinkTarget('foo bar.html', { enclosed: true })).toBeNull();
  });

  it('rejects control characters', () => {
    expect(checkLinkTarget('a\u0007b')).toBe('link target contains control characters');
  });

  it('rejects URLs that do not parse', () => {
    expect(checkLinkTarget('http://')).toBe('"http://" is not a valid URL');
  });

  it('rejects schemes other than web, mail, ftp and tel', () => {
    expect(checkLinkTarget('javascript:alert(1)')).toBe(
      'unsupported URL scheme "javascript:" in "javascript:alert(1)"',
    );
  });

  it('rejects mailto links without an address', () => {
    expect(checkLinkTarget('mailto:nobody')).toBe('"mailto:nobody" has no email address');
  });

  it('rejects a bare fragment marker', () => {
    expect(checkLinkTarget('#')).toBe('fragment link has no anchor');
  });

  it('rejects backslashes in relative paths', () => {
    expect(checkLinkTarget('docs\\intro.md')).toBe('relative link "docs\\intro.md" uses backslashes');
  });
});

describe('isExternalLink', () => {
  it('recognises absolute and protocol-relative URLs', () => {
    expect(isExternalLink('https://example.com/cover.png')).toBe(true);
    expect(isExternalLink('//cdn.example.com/cover.png')).toBe(true);
    expect(isExternalLink('/assets/img/cover.png')).toBe(false);
    expect(isExternalLink('img/cover.png')).toBe(false);
  });
});
