import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { splitFrontMatter } from '../frontmatter';
import { createPostDocument, slugifyTitle, writeNewPost } from '../scaffold';
import { validateFrontMatter } from '../schema';

const date = new Date('2024-05-01T09:30:00Z');

describe('slugifyTitle', () => {
  it('lowercases and drops punctuation', () => {
    expect(slugifyTitle('Virtual Threads: A Primer')).toBe('virtual-threads-a-primer');
  });

  it('falls back when nothing is left', () => {
    expect(slugifyTitle('???')).toBe('untitled');
  });
});

describe('createPostDocument', () => {
  it('names the file after the date and title', () => {
    const document = createPostDocument({ title: 'Virtual Threads: A Primer', date });

    expect(document.fileName).toBe('2024-05-01-virtual-threads-a-primer.md');
  });

  it('writes front matter that passes validation', () => {
    const document = createPostDocument({
      title: 'Virtual Threads: A Primer',
      date,
      description: 'Short',
      tags: ['java', 'loom', 'java'],
    });
    const { data, body } = splitFrontMatter(document.contents);

    expect(data).toEqual({
      layout: 'post',
      title: 'Virtual Threads: A Primer',
      date: '2024-05-01 09:30:00 +0000',
      description: 'Short',
      tags: ['java', 'loom'],
    });
    expect(body).toBe('');
    expect(validateFrontMatter(data).problems).toEqual([]);
  });

  it('trims tags before dropping duplicates', () => {
    const document = createPostDocument({ title: 'Note', date, tags: ['java', ' java', 'loom ', '  '] });
    const { data } = splitFrontMatter(document.contents);

    expect(data.tags).toEqual(['java', 'loom']);
  });

  it('uses the given layout', () => {
    const { data } = splitFrontMatter(createPostDocument({ title: 'Note', date }, 'note').contents);

    expect(data.layout).toBe('note');
  });

  it('requires a title', () => {
    expect(() => createPostDocument({ title: '  ', date })).toThrow('A post needs a title');
  });
});

describe('writeNewPost', () => {
  const testDir = path.join(os.tmpdir(), 'postshelf-test-scaffold');

  beforeEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  afterAll(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('creates the content directory and the post', async () => {
    const written = await writeNewPost(testDir, { title: 'First post', date });

    expect(written).toBe(path.join(testDir, '2024-05-01-first-post.md'));
    expect(fs.readFileSync(written, 'utf8')).toMatch(/^---\nlayout: post\ntitle: First post\n/);
  });

  it('refuses to overwrite unless forced', async () => {
    const written = await writeNewPost(testDir, { title: 'First post', date });

    await expect(writeNewPost(testDir, { title: 'First post', date })).rejects.toThrow(
      `Post already exists: ${written}`,
    );
    await expect(writeNewPost(testDir, { title: 'First post', date, body: 'Again\n' }, { force: true })).resolves.toBe(
      written,
    );
    expect(fs.readFileSync(written, 'utf8').endsWith('\nAgain\n')).toBe(true);
  });
});
