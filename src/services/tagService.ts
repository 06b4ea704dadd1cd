import { asc, count, desc, eq, ilike, type SQL } from 'drizzle-orm';
import type { Database } from '../db/index';
import { MAX_ID } from '../lib/validation';
import { postTags, tags } from '../db/schema';
import type { TagWithCount } from '../types/blog';
import type { TagInput } from '../schemas/blog';
import { translateDbError } from '../lib/errors';
import { escapeLike } from '../utils/sql';

const DUPLICATE_TAG = 'Tag with this name already exists';

export class TagService {
  constructor(private readonly db: Database) {}

  private async selectTagsWithCount(condition?: SQL): Promise<TagWithCount[]> {
    return this.db
      .select({
        id: tags.id,
        name: tags.name,
        createdAt: tags.createdAt,
        updatedAt: tags.updatedAt,
        postsCount: count(postTags.postId),
      })
      .from(tags)
      .leftJoin(postTags, eq(postTags.tagId, tags.id))
      .where(condition)
      .groupBy(tags.id)
      .orderBy(desc(tags.createdAt), asc(tags.name));
  }

  // Get all tags with the number of posts using each
  async listTags(filters: { search?: string } = {}): Promise<TagWithCount[]> {
    const condition = filters.search ? ilike(tags.name, `%${escapeLike(filters.search)}%`) : undefined;
    return this.selectTagsWithCount(condition);
  }

  async getTagById(id: number): Promise<TagWithCount | null> {
    const [tag] = await this.selectTagsWithCount(eq(tags.id, id));
    return tag ?? null;
  }

  /**
   * Resolves a `?tag=` lookup to tag ids: a number is taken as an id,
   * anything else matches names case-insensitively, exactly if any tag
   * matches exactly and by substring otherwise.
   */
  async resolveTagIds(tagParam: string): Promise<number[]> {
    const value = tagParam.trim();

    if (/^\d+$/.test(value)) {
      const id = Number(value);
      return id <= MAX_ID ? [id] : [];
    }

    const exact = await this.db
      .select({ id: tags.id })
      .from(tags)
      .where(ilike(tags.name, escapeLike(value)));
    if (exact.length > 0) {
      return exact.map((tag) => tag.id);
    }

    const partial = await this.db
      .select({ id: tags.id })
      .from(tags)
      .where(ilike(tags.name, `%${escapeLike(value)}%`));
    return partial.map((tag) => tag.id);
  }

  async createTag(data: TagInput): Promise<TagWithCount> {
    try {
      const [created] = await this.db.insert(tags).values({ name: data.name }).returning();
      return { ...created, postsCount: 0 };
    } catch (error) {
      translateDbError(error, { unique: DUPLICATE_TAG });
    }
  }

  async updateTag(id: number, data: Partial<TagInput>): Promise<TagWithCount | null> {
    try {
      const updated = await this.db
        .update(tags)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(tags.id, id))
        .returning({ id: tags.id });
      if (updated.length === 0) return null;
    } catch (error) {
      translateDbError(error, { unique: DUPLICATE_TAG });
    }
    return this.getTagById(id);
  }

  // Links to posts go with the tag (ON DELETE CASCADE)
  async deleteTag(id: number): Promise<boolean> {
    const deleted = await this.db.delete(tags).where(eq(tags.id, id)).returning({ id: tags.id });
    return deleted.length > 0;
  }
}
