import { and, asc, count, desc, eq, ilike, inArray, ne, or, sql, type SQL } from 'drizzle-orm';
import type { Database } from '../db/index';
import { blogs, posts, postTags, tags, users } from '../db/schema';
import type { PaginatedPosts, Post, Tag } from '../types/blog';
import type { CreatePostInput, Pagination, PostFilters, UpdatePostInput } from '../schemas/blog';
import { isUniqueViolation, translateDbError, ValidationError } from '../lib/errors';
import { slugify, uniqueSlug } from '../utils/slugify';
import { escapeLike } from '../utils/sql';
import { userSummaryColumns } from './userService';

const DUPLICATE_SLUG = 'Post with this slug already exists';
const FALLBACK_SLUG = 'post';

type PostRow = {
  post: typeof posts.$inferSelect;
  blog: typeof blogs.$inferSelect;
  user: Post['blog']['user'];
};

// Newest publication first; drafts (no publishedAt) after everything else
const recencyOrder = [
  sql`${posts.publishedAt} desc nulls last`,
  desc(posts.createdAt),
  desc(posts.id),
];

export class PostService {
  constructor(private readonly db: Database) {}

  private selectPosts() {
    return this.db
      .select({ post: posts, blog: blogs, user: userSummaryColumns })
      .from(posts)
      .innerJoin(blogs, eq(posts.blogId, blogs.id))
      .innerJoin(users, eq(blogs.userId, users.id));
  }

  private buildFilterCondition(filters: PostFilters): SQL | undefined {
    const conditions: SQL[] = [];

    if (filters.search) {
      const pattern = `%${escapeLike(filters.search)}%`;
      const searchCondition = or(ilike(posts.title, pattern), ilike(posts.content, pattern));
      if (searchCondition) conditions.push(searchCondition);
    }
    if (filters.blog !== undefined) {
      conditions.push(eq(posts.blogId, filters.blog));
    }
    if (filters.author) {
      conditions.push(eq(users.username, filters.author));
    }
    if (filters.published !== undefined) {
      conditions.push(eq(posts.isPublished, filters.published));
    }
    if (filters.tag !== undefined) {
      conditions.push(this.taggedWith([filters.tag]));
    }

    return and(...conditions);
  }

  private taggedWith(tagIds: number[]): SQL {
    return inArray(
      posts.id,
      this.db.select({ postId: postTags.postId }).from(postTags).where(inArray(postTags.tagId, tagIds)),
    );
  }

  private async findPosts(condition: SQL | undefined, pagination?: Pagination): Promise<Post[]> {
    const query = this.selectPosts()
      .where(condition)
      .orderBy(...recencyOrder);

    const rows = pagination
      ? await query.limit(pagination.pageSize).offset((pagination.page - 1) * pagination.pageSize)
      : await query;

    return this.populateTags(rows);
  }

  private async paginate(condition: SQL | undefined, pagination: Pagination): Promise<PaginatedPosts> {
    const [postResults, [totalResult]] = await Promise.all([
      this.findPosts(condition, pagination),
      this.db
        .select({ total: count() })
        .from(posts)
        .innerJoin(blogs, eq(posts.blogId, blogs.id))
        .innerJoin(users, eq(blogs.userId, users.id))
        .where(condition),
    ]);

    const total = totalResult?.total ?? 0;
    return {
      posts: postResults,
      total,
      page: pagination.page,
      pageSize: pagination.pageSize,
      totalPages: Math.ceil(total / pagination.pageSize),
    };
  }

  // Attach each post's tags (by name) and assemble the nested blog
  private async populateTags(rows: PostRow[]): Promise<Post[]> {
    if (rows.length === 0) return [];

    const postIds = rows.map((row) => row.post.id);
    const links = await this.db
      .select({ postId: postTags.postId, tag: tags })
      .from(postTags)
      .innerJoin(tags, eq(postTags.tagId, tags.id))
      .where(inArray(postTags.postId, postIds))
      .orderBy(asc(tags.name));

    const tagsByPost = new Map<number, Tag[]>();
    for (const link of links) {
      const list = tagsByPost.get(link.postId) ?? [];
      list.push(link.tag);
      tagsByPost.set(link.postId, list);
    }

    return rows.map((row) => ({
      ...row.post,
      tags: tagsByPost.get(row.post.id) ?? [],
      blog: { ...row.blog, user: row.user },
    }));
  }

  // Get all published posts, most recent first
  async getPublishedPosts(): Promise<Post[]> {
    return this.findPosts(eq(posts.isPublished, true));
  }

  async getPublishedPostsPaginated(pagination: Pagination): Promise<PaginatedPosts> {
    return this.paginate(eq(posts.isPublished, true), pagination);
  }

  // Get a published post by slug; drafts are treated as missing
  async getPublishedPostBySlug(slug: string): Promise<Post | null> {
    const [post] = await this.findPosts(and(eq(posts.slug, slug), eq(posts.isPublished, true)));
    return post ?? null;
  }

  async getPostById(id: number): Promise<Post | null> {
    const [post] = await this.findPosts(eq(posts.id, id));
    return post ?? null;
  }

  // Admin listing: every post, filtered
  async listPosts(filters: PostFilters = {}): Promise<Post[]> {
    return this.findPosts(this.buildFilterCondition(filters));
  }

  async listPostsPaginated(pagination: Pagination): Promise<PaginatedPosts> {
    return this.paginate(undefined, pagination);
  }

  async listPostsByTagIds(tagIds: number[], pagination: Pagination): Promise<PaginatedPosts> {
    if (tagIds.length === 0) {
      return { posts: [], total: 0, page: pagination.page, pageSize: pagination.pageSize, totalPages: 0 };
    }
    return this.paginate(this.taggedWith(tagIds), pagination);
  }

  /**
   * Creates a post. A blank slug is generated from the title and suffixed
   * (-1, -2, ...) until unused; an explicit slug that is taken is a conflict.
   * Publishing for the first time stamps publishedAt.
   */
  async createPost(data: CreatePostInput): Promise<Post> {
    // A generated slug can be taken by a concurrent insert before ours lands
    const attempts = data.slug ? 1 : 2;

    let id: number | undefined;
    for (let attempt = 1; id === undefined; attempt++) {
      try {
        id = await this.insertPost(data);
      } catch (error) {
        if (attempt < attempts && isUniqueViolation(error)) {
          continue;
        }
        translateDbError(error, { unique: DUPLICATE_SLUG, foreignKey: 'Blog does not exist' });
      }
    }

    return this.requirePost(id);
  }

  private insertPost(data: CreatePostInput): Promise<number> {
    return this.db.transaction(async (tx) => {
      const slug = data.slug
        ? data.slug
        : await this.generateSlug(tx, data.title);

      const isPublished = data.isPublished ?? false;
      const publishedAt = data.publishedAt ?? (isPublished ? new Date() : null);

      const [created] = await tx
        .insert(posts)
        .values({
          blogId: data.blogId,
          title: data.title,
          slug,
          content: data.content ?? '',
          excerpt: data.excerpt ?? '',
          cover: data.cover ?? null,
          isPublished,
          publishedAt,
        })
        .returning({ id: posts.id });

      await this.replaceTags(tx, created.id, data.tagIds ?? []);
      return created.id;
    });
  }

  /**
   * Applies a partial update. An empty slug regenerates it from the (new)
   * title; publishedAt is only ever stamped once, on first publication.
   */
  async updatePost(id: number, data: UpdatePostInput): Promise<Post | null> {
    try {
      const found = await this.db.transaction(async (tx) => {
        const [existing] = await tx.select().from(posts).where(eq(posts.id, id)).limit(1);
        if (!existing) return false;

        const title = data.title ?? existing.title;
        let slug = existing.slug;
        if (data.slug !== undefined) {
          slug = data.slug ? data.slug : await this.generateSlug(tx, title, id);
        }

        const isPublished = data.isPublished ?? existing.isPublished;
        let publishedAt = data.publishedAt !== undefined ? data.publishedAt : existing.publishedAt;
        if (isPublished && !publishedAt) {
          publishedAt = new Date();
        }

        await tx
          .update(posts)
          .set({
            blogId: data.blogId ?? existing.blogId,
            title,
            slug,
            content: data.content ?? existing.content,
            excerpt: data.excerpt ?? existing.excerpt,
            cover: data.cover !== undefined ? data.cover : existing.cover,
            isPublished,
            publishedAt,
            updatedAt: new Date(),
          })
          .where(eq(posts.id, id));

        if (data.tagIds !== undefined) {
          await this.replaceTags(tx, id, data.tagIds);
        }
        return true;
      });
      if (!found) return null;
    } catch (error) {
      translateDbError(error, { unique: DUPLICATE_SLUG, foreignKey: 'Blog does not exist' });
    }

    return this.requirePost(id);
  }

  // Tag links go with the post (ON DELETE CASCADE)
  async deletePost(id: number): Promise<boolean> {
    const deleted = await this.db.delete(posts).where(eq(posts.id, id)).returning({ id: posts.id });
    return deleted.length > 0;
  }

  private async requirePost(id: number): Promise<Post> {
    const post = await this.getPostById(id);
    if (!post) {
      throw new Error(`Post ${id} vanished after write`);
    }
    return post;
  }

  protected async generateSlug(db: Database, title: string, excludeId?: number): Promise<string> {
    const base = slugify(title) || FALLBACK_SLUG;
    return uniqueSlug(base, async (candidate) => {
      const condition = excludeId === undefined
        ? eq(posts.slug, candidate)
        : and(eq(posts.slug, candidate), ne(posts.id, excludeId));
      const [taken] = await db.select({ id: posts.id }).from(posts).where(condition).limit(1);
      return taken !== undefined;
    });
  }

  private async replaceTags(db: Database, postId: number, tagIds: number[]): Promise<void> {
    const uniqueIds = Array.from(new Set(tagIds));

    if (uniqueIds.length > 0) {
      const found = await db.select({ id: tags.id }).from(tags).where(inArray(tags.id, uniqueIds));
      if (found.length !== uniqueIds.length) {
        const known = new Set(found.map((tag) => tag.id));
        const missing = uniqueIds.filter((tagId) => !known.has(tagId));
        throw new ValidationError(`Unknown tag ids: ${missing.join(', ')}`, 'tagIds');
      }
    }

    await db.delete(postTags).where(eq(postTags.postId, postId));
    if (uniqueIds.length > 0) {
      await db.insert(postTags).values(uniqueIds.map((tagId) => ({ postId, tagId })));
    }
  }
}
