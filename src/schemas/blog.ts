import { createInsertSchema, createUpdateSchema } from 'drizzle-zod';
import { z } from 'zod';
import { MAX_ID } from '../lib/validation';
import { blogs, posts, tags, users } from '../db/schema';

const queryBoolean = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const slugPattern = /^[-a-zA-Z0-9_]+$/;

// Blogs

const blogInsertSchema = createInsertSchema(blogs, {
  title: (schema) => schema.trim().min(1, 'Title is required'),
});

export const createBlogSchema = blogInsertSchema.pick({ userId: true, title: true, bio: true });
export const updateBlogSchema = blogInsertSchema.pick({ title: true, bio: true }).partial();

// Member API: the owner comes from the session
export const createOwnBlogSchema = createBlogSchema.omit({ userId: true }).extend({
  bio: z.string().trim().min(1, 'Bio is required'),
});

export const blogFiltersSchema = z.object({
  search: z.string().trim().optional(),
  user: z.string().optional(),
});

// Tags

export const tagInputSchema = createInsertSchema(tags, {
  name: (schema) => schema.trim().min(1, 'Name is required'),
}).pick({ name: true });

export const tagFiltersSchema = z.object({
  search: z.string().trim().optional(),
});

// Posts

const postInsertSchema = createInsertSchema(posts, {
  title: (schema) => schema.trim().min(1, 'Title is required'),
});

export const createPostSchema = postInsertSchema
  .pick({ blogId: true, title: true, content: true, excerpt: true, cover: true, isPublished: true })
  .extend({
    // blank means "generate from the title"
    slug: z
      .string()
      .trim()
      .max(260)
      .refine((value) => value === '' || slugPattern.test(value), {
        message: 'Slug may only contain letters, numbers, underscores or hyphens',
      })
      .optional(),
    publishedAt: z.coerce.date().nullable().optional(),
    tagIds: z.array(z.number().int().positive().max(MAX_ID)).optional(),
  });

export const updatePostSchema = createPostSchema.partial();

export const createOwnPostSchema = createPostSchema.omit({ blogId: true, slug: true, publishedAt: true });
export const updateOwnPostSchema = createOwnPostSchema.partial();

export const postFiltersSchema = z.object({
  search: z.string().trim().optional(),
  blog: z.coerce.number().int().positive().max(MAX_ID).optional(),
  author: z.string().trim().optional(),
  published: queryBoolean.optional(),
  tag: z.coerce.number().int().positive().max(MAX_ID).optional(),
});

export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce
    .number()
    .int()
    .min(1)
    .default(5)
    .transform((size) => Math.min(size, 100)),
});

// Users

export const updateUserSchema = createUpdateSchema(users, {
  name: (schema) => schema.trim().min(1, 'Name is required'),
}).pick({ name: true, isStaff: true, isSuperuser: true });

export const userFiltersSchema = z.object({
  search: z.string().trim().optional(),
  isStaff: queryBoolean.optional(),
});

export type CreateBlogInput = z.infer<typeof createBlogSchema>;
export type UpdateBlogInput = z.infer<typeof updateBlogSchema>;
export type BlogFilters = z.infer<typeof blogFiltersSchema>;
export type TagInput = z.infer<typeof tagInputSchema>;
export type CreatePostInput = z.infer<typeof createPostSchema>;
export type UpdatePostInput = z.infer<typeof updatePostSchema>;
export type PostFilters = z.infer<typeof postFiltersSchema>;
export type Pagination = z.infer<typeof paginationSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
export type UserFilters = z.infer<typeof userFiltersSchema>;
