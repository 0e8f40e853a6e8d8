import type { Server } from 'http';
import * as path from 'path';
import { loadCollection } from '../../content/collection';
import { createApp, startServer } from '../app';

const SAMPLE_DIR = path.resolve(__dirname, '../../../content/_posts');

describe('posts API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const collection = await loadCollection(SAMPLE_DIR);
    server = await startServer(createApp(collection, { corsOrigin: 'https://blog.example' }), 0, '127.0.0.1');
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected the server to listen on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it('reports health with the post count', async () => {
    const response = await fetch(`${baseUrl}/healthz`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', posts: 4 });
  });

  it('lists post summaries newest first', async () => {
    const response = await fetch(`${baseUrl}/api/posts`);
    const posts = await response.json();

    expect(response.headers.get('access-control-allow-origin')).toBe('https://blog.example');
    expect(posts).toEqual([
      {
        id: '2023-10-03-virtual-threads-in-practice.md',
        slug: 'virtual-threads-in-practice',
        layout: 'post',
        title: 'Virtual threads in practice',
        date: '2023-10-03T07:45:00.000Z',
        description: 'Project Loom lands in Java 21. What changes for blocking code, and what to watch out for.',
        image: '/assets/img/loom.svg',
        tags: ['java', 'loom', 'concurrency'],
      },
      expect.objectContaining({ slug: 'integration-tests-with-testcontainers' }),
      expect.objectContaining({ slug: 'tail-calls-on-the-jvm' }),
      expect.objectContaining({ slug: 'living-with-optional' }),
    ]);
  });

  it('filters the listing by tag', async () => {
    const response = await fetch(`${baseUrl}/api/posts?tag=testing`);

    expect(await response.json()).toEqual([
      expect.objectContaining({ slug: 'integration-tests-with-testcontainers' }),
    ]);
  });

  it('lists tags with counts', async () => {
    const response = await fetch(`${baseUrl}/api/tags`);

    expect(await response.json()).toEqual([
      { name: 'java', count: 4 },
      { name: 'api-design', count: 1 },
      { name: 'concurrency', count: 1 },
      { name: 'functional', count: 1 },
      { name: 'loom', count: 1 },
      { name: 'optional', count: 1 },
      { name: 'postgres', count: 1 },
      { name: 'recursion', count: 1 },
      { name: 'testcontainers', count: 1 },
      { name: 'testing', count: 1 },
    ]);
  });

  it('returns a rendered post by slug', async () => {
    const response = await fetch(`${baseUrl}/api/posts/tail-calls-on-the-jvm`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      slug: 'tail-calls-on-the-jvm',
      title: 'Tail calls on the JVM',
      headings: [{ id: 'a-trampoline', text: 'A trampoline', level: 2 }],
      html: expect.stringContaining('<h2 id="a-trampoline">A trampoline</h2>'),
      body: expect.stringContaining('static <T> T run(TailCall<T> call)'),
    });
  });

  it('answers 404 for an unknown slug', async () => {
    const response = await fetch(`${baseUrl}/api/posts/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'Post not found' });
  });

  it('answers 404 for an unknown route', async () => {
    const response = await fetch(`${baseUrl}/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: 'No route for GET /nope' });
  });
});
