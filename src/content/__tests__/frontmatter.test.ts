import { FrontMatterError } from '../../errors';
import { splitFrontMatter, stringifyFrontMatter } from '../frontmatter';

const errorFrom = (source: string): FrontMatterError => {
  try {
    splitFrontMatter(source);
  } catch (error) {
    if (error instanceof FrontMatterError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected splitFrontMatter to throw');
};

describe('splitFrontMatter', () => {
  it('separates the metadata block from the body', () => {
    const result = splitFrontMatter('---\ntitle: Hello\ndate: 2020-01-01\n---\nBody line\n');

    expect(result.data).toEqual({ title: 'Hello', date: '2020-01-01' });
    expect(result.body).toBe('Body line\n');
    expect(result.bodyLine).toBe(5);
    expect(result.keyLines).toEqual({ title: 2, date: 3 });
  });

  it('tolerates a byte order mark and CRLF line endings', () => {
    const result = splitFrontMatter('\uFEFF---\r\ntitle: X\r\n---\r\nText');

    expect(result.data).toEqual({ title: 'X' });
    expect(result.body).toBe('Text');
    expect(result.bodyLine).toBe(4);
  });

  it('accepts ... as the closing delimiter', () => {
    const result = splitFrontMatter('---\ntitle: Dots\n...\nAfter');

    expect(result.data).toEqual({ title: 'Dots' });
    expect(result.body).toBe('After');
  });

  it('decodes an empty block to an empty mapping', () => {
    const result = splitFrontMatter('---\n---\nbody');

    expect(result.data).toEqual({});
    expect(result.body).toBe('body');
  });

  it('keeps a later --- inside the body', () => {
    const result = splitFrontMatter('---\ntitle: A\n---\nabove\n---\nbelow');

    expect(result.body).toBe('above\n---\nbelow');
  });

  it('rejects a document without an opening delimiter', () => {
    const error = errorFrom('title: Hello\n---\n');

    expect(error.message).toBe('Missing front matter: the document must start with ---');
    expect(error.line).toBe(1);
  });

  it('rejects a block that is never closed', () => {
    const error = errorFrom('---\ntitle: Hello\nbody text');

    expect(error.message).toBe('Front matter is never closed with --- or ...');
  });

  it('reports YAML syntax errors', () => {
    const error = errorFrom('---\ntitle: [unclosed\n---\n');

    expect(error.message).toMatch(/^Invalid YAML in front matter: /);
    expect(error.line).toBeGreaterThanOrEqual(2);
  });

  it('rejects duplicate keys', () => {
    const error = errorFrom('---\ntitle: a\ntitle: b\n---\n');

    expect(error.message).toMatch(/^Invalid YAML in front matter: /);
  });

  it('rejects a block that is not a mapping', () => {
    const error = errorFrom('---\njust text\n---\n');

    expect(error.message).toBe('Front matter must be a mapping of keys to values');
    expect(error.line).toBe(2);
  });
});

describe('stringifyFrontMatter', () => {
  it('writes the delimiters around the YAML block', () => {
    expect(stringifyFrontMatter({ title: 'Hi' }, 'Body\n')).toBe('---\ntitle: Hi\n---\n\nBody\n');
  });

  it('omits the blank line when there is no body', () => {
    expect(stringifyFrontMatter({ title: 'Hi' })).toBe('---\ntitle: Hi\n---\n');
  });

  it('produces documents that split back into the same data', () => {
    const data = { layout: 'post', title: 'Loom: a primer', tags: ['java', 'loom'] };

    expect(splitFrontMatter(stringifyFrontMatter(data, 'Text')).data).toEqual(data);
  });
});
