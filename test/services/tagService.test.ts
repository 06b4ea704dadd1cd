import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { BlogService } from '../../src/services/blogService';
import { PostService } from '../../src/services/postService';
import { TagService } from '../../src/services/tagService';
import { ConflictError } from '../../src/lib/errors';
import { createTestDb, insertUser, resetDb, type TestDatabase } from '../helpers/db';

describe('TagService', () => {
  let testDb: TestDatabase;
  let tagService: TagService;
  let postService: PostService;

  beforeAll(async () => {
    testDb = await createTestDb();
    tagService = new TagService(testDb.db);
    postService = new PostService(testDb.db);
  });

  afterAll(async () => {
    await testDb.close();
  });

  beforeEach(async () => {
    await resetDb(testDb.db);
  });

  it('creates tags with unique names', async () => {
    const tag = await tagService.createTag({ name: 'express' });
    expect(tag).toMatchObject({ id: 1, name: 'express', postsCount: 0 });

    await expect(tagService.createTag({ name: 'express' })).rejects.toThrow(
      new ConflictError('Tag with this name already exists'),
    );
  });

  it('counts the posts using each tag', async () => {
    const alice = await insertUser(testDb.db, 'alice');
    const blog = await new BlogService(testDb.db).createBlog({ userId: alice.id, title: 'Notes' });
    const express = await tagService.createTag({ name: 'express' });
    await tagService.createTag({ name: 'cms' });
    await postService.createPost({ blogId: blog.id, title: 'A', tagIds: [express.id] });
    await postService.createPost({ blogId: blog.id, title: 'B', tagIds: [express.id] });

    const counts = Object.fromEntries((await tagService.listTags()).map((tag) => [tag.name, tag.postsCount]));

    expect(counts).toEqual({ express: 2, cms: 0 });
    expect(await tagService.getTagById(express.id)).toMatchObject({ name: 'express', postsCount: 2 });
  });

  it('searches names case-insensitively', async () => {
    await tagService.createTag({ name: 'Express' });
    await tagService.createTag({ name: 'cms' });

    expect((await tagService.listTags({ search: 'expr' })).map((tag) => tag.name)).toEqual(['Express']);
  });

  describe('resolveTagIds', () => {
    it('takes numbers as ids', async () => {
      expect(await tagService.resolveTagIds('42')).toEqual([42]);
    });

    it('matches nothing for numbers past the id range', async () => {
      expect(await tagService.resolveTagIds('2147483647')).toEqual([2147483647]);
      expect(await tagService.resolveTagIds('2147483648')).toEqual([]);
    });

    it('prefers an exact case-insensitive name match', async () => {
      const go = await tagService.createTag({ name: 'go' });
      await tagService.createTag({ name: 'express' });

      expect(await tagService.resolveTagIds('Go')).toEqual([go.id]);
    });

    it('falls back to a partial match', async () => {
      const express = await tagService.createTag({ name: 'express' });
      await tagService.createTag({ name: 'cms' });

      expect(await tagService.resolveTagIds('XPRE')).toEqual([express.id]);
      expect(await tagService.resolveTagIds('rust')).toEqual([]);
    });

    it('treats LIKE wildcards literally', async () => {
      await tagService.createTag({ name: 'express' });
      expect(await tagService.resolveTagIds('%')).toEqual([]);
    });
  });

  it('renames tags', async () => {
    const tag = await tagService.createTag({ name: 'js' });
    await tagService.createTag({ name: 'typescript' });

    expect(await tagService.updateTag(tag.id, { name: 'javascript' })).toMatchObject({ id: tag.id, name: 'javascript' });
    await expect(tagService.updateTag(tag.id, { name: 'typescript' })).rejects.toBeInstanceOf(ConflictError);
    expect(await tagService.updateTag(9999, { name: 'ghost' })).toBeNull();
  });

  it('unlinks deleted tags from posts', async () => {
    const alice = await insertUser(testDb.db, 'alice');
    const blog = await new BlogService(testDb.db).createBlog({ userId: alice.id, title: 'Notes' });
    const tag = await tagService.createTag({ name: 'express' });
    const post = await postService.createPost({ blogId: blog.id, title: 'Tagged', tagIds: [tag.id] });

    expect(await tagService.deleteTag(tag.id)).toBe(true);

    const reloaded = await postService.getPostById(post.id);
    expect(reloaded?.tags).toEqual([]);
    expect(await tagService.deleteTag(tag.id)).toBe(false);
  });
});
