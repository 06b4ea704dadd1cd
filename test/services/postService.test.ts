import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import type { Blog } from '../../src/types/blog';
import { BlogService } from '../../src/services/blogService';
import { PostService } from '../../src/services/postService';
import { TagService } from '../../src/services/tagService';
import { ConflictError, ValidationError } from '../../src/lib/errors';
import type { Database } from '../../src/db/index';
import { slugify } from '../../src/utils/slugify';
import { createTestDb, insertUser, resetDb, type TestDatabase } from '../helpers/db';

// Answers with the bare title slug for the first `staleReads` lookups, as if
// another insert took it between the check and our write
class StaleSlugPostService extends PostService {
  constructor(db: Database, private staleReads: number) {
    super(db);
  }

  protected async generateSlug(db: Database, title: string, excludeId?: number): Promise<string> {
    if (this.staleReads > 0) {
      this.staleReads--;
      return slugify(title);
    }
    return super.generateSlug(db, title, excludeId);
  }
}

describe('PostService', () => {
  let testDb: TestDatabase;
  let postService: PostService;
  let tagService: TagService;
  let blog: Blog;

  beforeAll(async () => {
    testDb = await createTestDb();
    postService = new PostService(testDb.db);
    tagService = new TagService(testDb.db);
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetDb(testDb.db);
    const alice = await insertUser(testDb.db, 'alice');
    blog = await new BlogService(testDb.db).createBlog({ userId: alice.id, title: 'Notes' });
  });

  describe('slugs', () => {
    it('generates a slug from the title and de-duplicates it', async () => {
      const first = await postService.createPost({ blogId: blog.id, title: 'Hello World' });
      const second = await postService.createPost({ blogId: blog.id, title: 'Hello World' });
      const third = await postService.createPost({ blogId: blog.id, title: 'Hello, World!', slug: '' });

      expect([first.slug, second.slug, third.slug]).toEqual(['hello-world', 'hello-world-1', 'hello-world-2']);
    });

    it('falls back to a generic slug when the title has no usable characters', async () => {
      const post = await postService.createPost({ blogId: blog.id, title: '!!!' });
      expect(post.slug).toBe('post');
    });

    it('rejects a duplicate explicit slug', async () => {
      await postService.createPost({ blogId: blog.id, title: 'One', slug: 'custom' });

      await expect(
        postService.createPost({ blogId: blog.id, title: 'Two', slug: 'custom' }),
      ).rejects.toThrow(new ConflictError('Post with this slug already exists'));
      expect(await postService.listPosts()).toHaveLength(1);
    });

    it('picks a new slug when a generated one is taken before the insert', async () => {
      await postService.createPost({ blogId: blog.id, title: 'Hello World' });

      const racing = new StaleSlugPostService(testDb.db, 1);
      const post = await racing.createPost({ blogId: blog.id, title: 'Hello World' });

      expect(post.slug).toBe('hello-world-1');
      expect(await postService.listPosts()).toHaveLength(2);
    });

    it('gives up after one retry', async () => {
      await postService.createPost({ blogId: blog.id, title: 'Hello World' });

      const racing = new StaleSlugPostService(testDb.db, 2);
      await expect(
        racing.createPost({ blogId: blog.id, title: 'Hello World' }),
      ).rejects.toThrow(new ConflictError('Post with this slug already exists'));
      expect(await postService.listPosts()).toHaveLength(1);
    });

    it('keeps its own slug when regenerated on update', async () => {
      const post = await postService.createPost({ blogId: blog.id, title: 'First' });

      const same = await postService.updatePost(post.id, { slug: '' });
      const renamed = await postService.updatePost(post.id, { title: 'Second Thoughts', slug: '' });

      expect(same?.slug).toBe('first');
      expect(renamed?.slug).toBe('second-thoughts');
    });

    it('rejects posts for a missing blog', async () => {
      await expect(postService.createPost({ blogId: 9999, title: 'Lost' })).rejects.toThrow(
        new ValidationError('Blog does not exist'),
      );
    });
  });

  describe('publication', () => {
    it('leaves drafts without a publication date', async () => {
      const post = await postService.createPost({ blogId: blog.id, title: 'Draft' });
      expect(post.isPublished).toBe(false);
      expect(post.publishedAt).toBeNull();
    });

    it('stamps publishedAt on first publication and keeps it afterwards', async () => {
      const post = await postService.createPost({ blogId: blog.id, title: 'Draft' });

      const published = await postService.updatePost(post.id, { isPublished: true });
      const firstPublishedAt = published?.publishedAt;
      expect(firstPublishedAt).toBeInstanceOf(Date);

      const unpublished = await postService.updatePost(post.id, { isPublished: false });
      expect(unpublished?.isPublished).toBe(false);
      expect(unpublished?.publishedAt?.getTime()).toBe(firstPublishedAt?.getTime());

      const republished = await postService.updatePost(post.id, { isPublished: true });
      expect(republished?.publishedAt?.getTime()).toBe(firstPublishedAt?.getTime());
    });

    it('keeps an explicit publication date', async () => {
      const publishedAt = new Date('2024-03-01T10:00:00.000Z');
      const post = await postService.createPost({ blogId: blog.id, title: 'Dated', isPublished: true, publishedAt });
      expect(post.publishedAt?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    });

    it('lists only published posts, most recent first', async () => {
      await postService.createPost({
        blogId: blog.id,
        title: 'Older',
        isPublished: true,
        publishedAt: new Date('2024-01-01T00:00:00.000Z'),
      });
      await postService.createPost({
        blogId: blog.id,
        title: 'Newer',
        isPublished: true,
        publishedAt: new Date('2024-06-01T00:00:00.000Z'),
      });
      await postService.createPost({ blogId: blog.id, title: 'Hidden draft' });

      const published = await postService.getPublishedPosts();
      expect(published.map((post) => post.title)).toEqual(['Newer', 'Older']);
    });

    it('hides drafts from the slug lookup', async () => {
      await postService.createPost({ blogId: blog.id, title: 'Secret' });
      await postService.createPost({ blogId: blog.id, title: 'Public', isPublished: true });

      expect(await postService.getPublishedPostBySlug('secret')).toBeNull();
      expect((await postService.getPublishedPostBySlug('public'))?.title).toBe('Public');
    });
  });

  describe('tags', () => {
    it('attaches tags sorted by name', async () => {
      const express = await tagService.createTag({ name: 'express' });
      const cms = await tagService.createTag({ name: 'cms' });

      const post = await postService.createPost({ blogId: blog.id, title: 'Tagged', tagIds: [express.id, cms.id] });

      expect(post.tags.map((tag) => tag.name)).toEqual(['cms', 'express']);
    });

    it('replaces tags on update and leaves them alone otherwise', async () => {
      const express = await tagService.createTag({ name: 'express' });
      const cms = await tagService.createTag({ name: 'cms' });
      const post = await postService.createPost({ blogId: blog.id, title: 'Tagged', tagIds: [express.id] });

      const retitled = await postService.updatePost(post.id, { title: 'Retitled' });
      expect(retitled?.tags.map((tag) => tag.name)).toEqual(['express']);

      const retagged = await postService.updatePost(post.id, { tagIds: [cms.id] });
      expect(retagged?.tags.map((tag) => tag.name)).toEqual(['cms']);
    });

    it('rejects unknown tag ids without creating the post', async () => {
      await expect(
        postService.createPost({ blogId: blog.id, title: 'Bad tags', tagIds: [999] }),
      ).rejects.toThrow(new ValidationError('Unknown tag ids: 999', 'tagIds'));
      expect(await postService.listPosts()).toEqual([]);
    });
  });

  describe('listing', () => {
    it('filters by search, status, author, blog and tag', async () => {
      const express = await tagService.createTag({ name: 'express' });
      await postService.createPost({
        blogId: blog.id,
        title: 'Express tips',
        content: '<p>Models</p>',
        isPublished: true,
        tagIds: [express.id],
      });
      await postService.createPost({ blogId: blog.id, title: 'Gardening', content: '<p>Tomatoes</p>' });

      const titles = async (filters: Parameters<PostService['listPosts']>[0]) =>
        (await postService.listPosts(filters)).map((post) => post.title);

      expect(await titles({ search: 'tomato' })).toEqual(['Gardening']);
      expect(await titles({ published: false })).toEqual(['Gardening']);
      expect(await titles({ published: true })).toEqual(['Express tips']);
      expect(await titles({ tag: express.id })).toEqual(['Express tips']);
      expect(await titles({ author: 'nobody' })).toEqual([]);
      expect(await titles({ author: 'alice', blog: blog.id })).toHaveLength(2);
    });

    it('paginates posts with a tag', async () => {
      const express = await tagService.createTag({ name: 'express' });
      for (const title of ['One', 'Two', 'Three']) {
        await postService.createPost({ blogId: blog.id, title, tagIds: [express.id] });
      }
      await postService.createPost({ blogId: blog.id, title: 'Untagged' });

      const page = await postService.listPostsByTagIds([express.id], { page: 2, pageSize: 2 });

      expect(page.total).toBe(3);
      expect(page.totalPages).toBe(2);
      expect(page.page).toBe(2);
      expect(page.posts).toHaveLength(1);
    });

    it('returns an empty page when no tag matched', async () => {
      expect(await postService.listPostsByTagIds([], { page: 1, pageSize: 5 })).toEqual({
        posts: [],
        total: 0,
        page: 1,
        pageSize: 5,
        totalPages: 0,
      });
    });

    it('nests the blog and its owner', async () => {
      const post = await postService.createPost({ blogId: blog.id, title: 'Nested' });
      expect(post.blog).toMatchObject({ id: blog.id, title: 'Notes', user: { username: 'alice' } });
    });
  });

  it('deletes posts', async () => {
    const post = await postService.createPost({ blogId: blog.id, title: 'Temporary' });

    expect(await postService.deletePost(post.id)).toBe(true);
    expect(await postService.getPostById(post.id)).toBeNull();
    expect(await postService.deletePost(post.id)).toBe(false);
  });

  it('returns null when updating a missing post', async () => {
    expect(await postService.updatePost(9999, { title: 'Ghost' })).toBeNull();
  });
});
