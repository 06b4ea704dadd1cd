import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { BlogService } from '../../src/services/blogService';
import { PostService } from '../../src/services/postService';
import { ConflictError, ValidationError } from '../../src/lib/errors';
import { createTestDb, insertUser, resetDb, type TestDatabase } from '../helpers/db';

describe('BlogService', () => {
  let testDb: TestDatabase;
  let blogService: BlogService;
  let postService: PostService;

  beforeAll(async () => {
    testDb = await createTestDb();
    blogService = new BlogService(testDb.db);
    postService = new PostService(testDb.db);
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetDb(testDb.db);
  });

  it('creates a blog with its owner', async () => {
    const alice = await insertUser(testDb.db, 'alice');

    const blog = await blogService.createBlog({ userId: alice.id, title: 'Cooking Notes', bio: 'Recipes' });

    expect(blog).toMatchObject({
      userId: alice.id,
      title: 'Cooking Notes',
      bio: 'Recipes',
      user: { id: alice.id, username: 'alice', name: 'alice', email: 'alice@example.com' },
    });
  });

  it('allows one blog per user', async () => {
    const alice = await insertUser(testDb.db, 'alice');
    await blogService.createBlog({ userId: alice.id, title: 'First' });

    await expect(blogService.createBlog({ userId: alice.id, title: 'Second' })).rejects.toThrow(
      new ConflictError('User already has a blog'),
    );
    expect(await blogService.listBlogs()).toHaveLength(1);
  });

  it('rejects an unknown owner', async () => {
    await expect(blogService.createBlog({ userId: 'nobody', title: 'Orphan' })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('ensures a default blog exactly once', async () => {
    const alice = await insertUser(testDb.db, 'alice');

    const first = await blogService.ensureBlogForUser(alice);
    const second = await blogService.ensureBlogForUser(alice);

    expect(first.title).toBe("alice's Blog");
    expect(first.bio).toBe('Personal blog of alice');
    expect(second.id).toBe(first.id);
  });

  it('searches titles and owners, and filters by owner', async () => {
    const alice = await insertUser(testDb.db, 'alice');
    const bob = await insertUser(testDb.db, 'bob');
    await blogService.createBlog({ userId: alice.id, title: 'Cooking Notes' });
    await blogService.createBlog({ userId: bob.id, title: 'Travel Diary' });

    expect((await blogService.listBlogs({ search: 'travel' })).map((b) => b.title)).toEqual(['Travel Diary']);
    expect((await blogService.listBlogs({ search: 'ALI' })).map((b) => b.title)).toEqual(['Cooking Notes']);
    expect((await blogService.listBlogs({ user: bob.id })).map((b) => b.title)).toEqual(['Travel Diary']);
  });

  it('updates title and bio', async () => {
    const alice = await insertUser(testDb.db, 'alice');
    const blog = await blogService.createBlog({ userId: alice.id, title: 'Old' });

    const updated = await blogService.updateBlog(blog.id, { title: 'New', bio: 'Fresh' });

    expect(updated).toMatchObject({ id: blog.id, title: 'New', bio: 'Fresh' });
    expect(await blogService.updateBlog(9999, { title: 'Nope' })).toBeNull();
  });

  it('deletes a blog together with its posts', async () => {
    const alice = await insertUser(testDb.db, 'alice');
    const blog = await blogService.createBlog({ userId: alice.id, title: 'Short lived' });
    const post = await postService.createPost({ blogId: blog.id, title: 'Gone soon', isPublished: true });

    expect(await blogService.deleteBlog(blog.id)).toBe(true);

    expect(await blogService.getBlogById(blog.id)).toBeNull();
    expect(await postService.getPostById(post.id)).toBeNull();
    expect(await blogService.deleteBlog(blog.id)).toBe(false);
  });
});
