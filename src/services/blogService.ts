import { and, asc, desc, eq, ilike, or, type SQL } from 'drizzle-orm';
import type { Database } from '../db/index';
import { blogs, users } from '../db/schema';
import type { Blog } from '../types/blog';
import type { BlogFilters, CreateBlogInput, UpdateBlogInput } from '../schemas/blog';
import { ConflictError, ValidationError } from '../lib/errors';
import { escapeLike } from '../utils/sql';
import { userSummaryColumns } from './userService';

export const USER_ALREADY_HAS_BLOG = 'User already has a blog';

export function defaultBlogTitle(username: string): string {
  return `${username}'s Blog`;
}

export function defaultBlogBio(username: string): string {
  return `Personal blog of ${username}`;
}

type BlogRow = { blog: typeof blogs.$inferSelect; user: Blog['user'] };

function toBlog(row: BlogRow): Blog {
  return { ...row.blog, user: row.user };
}

export class BlogService {
  constructor(private readonly db: Database) {}

  private selectBlogs() {
    return this.db
      .select({ blog: blogs, user: userSummaryColumns })
      .from(blogs)
      .innerJoin(users, eq(blogs.userId, users.id));
  }

  // Get all blogs, newest first, optionally searching title/owner and filtering by owner
  async listBlogs(filters: BlogFilters = {}): Promise<Blog[]> {
    const conditions: SQL[] = [];

    if (filters.search) {
      const pattern = `%${escapeLike(filters.search)}%`;
      const searchCondition = or(ilike(blogs.title, pattern), ilike(users.username, pattern));
      if (searchCondition) conditions.push(searchCondition);
    }
    if (filters.user) {
      conditions.push(eq(blogs.userId, filters.user));
    }

    const rows = await this.selectBlogs()
      .where(and(...conditions))
      .orderBy(desc(blogs.createdAt), desc(blogs.id));
    return rows.map(toBlog);
  }

  async getBlogById(id: number): Promise<Blog | null> {
    const [row] = await this.selectBlogs().where(eq(blogs.id, id)).limit(1);
    return row ? toBlog(row) : null;
  }

  // The user's blog; the oldest one if the one-per-user rule was bypassed
  async getBlogForUser(userId: string): Promise<Blog | null> {
    const [row] = await this.selectBlogs()
      .where(eq(blogs.userId, userId))
      .orderBy(asc(blogs.id))
      .limit(1);
    return row ? toBlog(row) : null;
  }

  // Create a blog; each user owns at most one
  async createBlog(data: CreateBlogInput): Promise<Blog> {
    const [owner] = await this.db.select({ id: users.id }).from(users).where(eq(users.id, data.userId)).limit(1);
    if (!owner) {
      throw new ValidationError('User does not exist', 'userId');
    }

    const existing = await this.getBlogForUser(data.userId);
    if (existing) {
      throw new ConflictError(USER_ALREADY_HAS_BLOG);
    }

    const [created] = await this.db
      .insert(blogs)
      .values({ userId: data.userId, title: data.title, bio: data.bio ?? '' })
      .returning({ id: blogs.id });

    const blog = await this.getBlogById(created.id);
    if (!blog) {
      throw new Error(`Blog ${created.id} vanished after insert`);
    }
    return blog;
  }

  // Get the user's blog, creating the default one when missing
  async ensureBlogForUser(user: { id: string; username: string }): Promise<Blog> {
    const existing = await this.getBlogForUser(user.id);
    if (existing) return existing;

    return this.createBlog({
      userId: user.id,
      title: defaultBlogTitle(user.username),
      bio: defaultBlogBio(user.username),
    });
  }

  async updateBlog(id: number, data: UpdateBlogInput): Promise<Blog | null> {
    const updated = await this.db
      .update(blogs)
      .set({ ...data, updatedAt: new Date() })
      .where(eq(blogs.id, id))
      .returning({ id: blogs.id });
    if (updated.length === 0) return null;
    return this.getBlogById(id);
  }

  // Posts go with the blog (ON DELETE CASCADE)
  async deleteBlog(id: number): Promise<boolean> {
    const deleted = await this.db.delete(blogs).where(eq(blogs.id, id)).returning({ id: blogs.id });
    return deleted.length > 0;
  }
}
