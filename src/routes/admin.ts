import express, { Router } from 'express';
import type { Services } from '../services/index';
import type { Auth } from '../auth';
import { asyncHandler, requireAuth, requireStaff } from '../middleware/auth';
import { NotFoundError } from '../lib/errors';
import { parseId, parseInput } from '../lib/validation';
import {
  blogFiltersSchema,
  createBlogSchema,
  createPostSchema,
  postFiltersSchema,
  tagFiltersSchema,
  tagInputSchema,
  updateBlogSchema,
  updatePostSchema,
  updateUserSchema,
  userFiltersSchema,
} from '../schemas/blog';
import { blogs, posts, tags, users } from '../db/schema';

/**
 * Staff-only CRUD over users, blogs, posts and tags.
 */
export function createAdminRouter(auth: Auth, services: Services): Router {
  const { userService, blogService, postService, tagService } = services;
  const router: Router = express.Router();

  router.use(requireAuth(auth, userService), requireStaff);

  // GET / - record counts per model
  router.get('/', asyncHandler(async (req, res) => {
    const [userCount, blogCount, postCount, tagCount] = await Promise.all([
      services.db.$count(users),
      services.db.$count(blogs),
      services.db.$count(posts),
      services.db.$count(tags),
    ]);
    res.json({
      models: {
        users: { count: userCount, url: '/admin/users' },
        blogs: { count: blogCount, url: '/admin/blogs' },
        posts: { count: postCount, url: '/admin/posts' },
        tags: { count: tagCount, url: '/admin/tags' },
      },
    });
  }));

  // Users

  router.get('/users', asyncHandler(async (req, res) => {
    const filters = parseInput(userFiltersSchema, req.query);
    res.json(await userService.listUsers(filters));
  }));

  router.get('/users/:id', asyncHandler(async (req, res) => {
    const user = await userService.getUserById(req.params.id);
    if (!user) throw new NotFoundError('User not found');
    res.json(user);
  }));

  router.patch('/users/:id', asyncHandler(async (req, res) => {
    const body = parseInput(updateUserSchema, req.body);
    const user = await userService.updateUser(req.params.id, body);
    if (!user) throw new NotFoundError('User not found');
    res.json(user);
  }));

  router.delete('/users/:id', asyncHandler(async (req, res) => {
    const deleted = await userService.deleteUser(req.params.id);
    if (!deleted) throw new NotFoundError('User not found');
    res.status(204).send();
  }));

  // Blogs

  router.get('/blogs', asyncHandler(async (req, res) => {
    const filters = parseInput(blogFiltersSchema, req.query);
    res.json(await blogService.listBlogs(filters));
  }));

  router.post('/blogs', asyncHandler(async (req, res) => {
    const body = parseInput(createBlogSchema, req.body);
    const blog = await blogService.createBlog(body);
    res.status(201).json(blog);
  }));

  router.get('/blogs/:id', asyncHandler(async (req, res) => {
    const blog = await blogService.getBlogById(parseId(req.params.id));
    if (!blog) throw new NotFoundError('Blog not found');
    res.json(blog);
  }));

  router.put('/blogs/:id', asyncHandler(async (req, res) => {
    const body = parseInput(updateBlogSchema, req.body);
    const blog = await blogService.updateBlog(parseId(req.params.id), body);
    if (!blog) throw new NotFoundError('Blog not found');
    res.json(blog);
  }));

  router.delete('/blogs/:id', asyncHandler(async (req, res) => {
    const deleted = await blogService.deleteBlog(parseId(req.params.id));
    if (!deleted) throw new NotFoundError('Blog not found');
    res.status(204).send();
  }));

  // Posts

  router.get('/posts', asyncHandler(async (req, res) => {
    const filters = parseInput(postFiltersSchema, req.query);
    res.json(await postService.listPosts(filters));
  }));

  router.post('/posts', asyncHandler(async (req, res) => {
    const body = parseInput(createPostSchema, req.body);
    const post = await postService.createPost(body);
    res.status(201).json(post);
  }));

  router.get('/posts/:id', asyncHandler(async (req, res) => {
    const post = await postService.getPostById(parseId(req.params.id));
    if (!post) throw new NotFoundError('Post not found');
    res.json(post);
  }));

  router.put('/posts/:id', asyncHandler(async (req, res) => {
    const body = parseInput(updatePostSchema, req.body);
    const post = await postService.updatePost(parseId(req.params.id), body);
    if (!post) throw new NotFoundError('Post not found');
    res.json(post);
  }));

  router.delete('/posts/:id', asyncHandler(async (req, res) => {
    const deleted = await postService.deletePost(parseId(req.params.id));
    if (!deleted) throw new NotFoundError('Post not found');
    res.status(204).send();
  }));

  // Tags

  router.get('/tags', asyncHandler(async (req, res) => {
    const filters = parseInput(tagFiltersSchema, req.query);
    res.json(await tagService.listTags(filters));
  }));

  router.post('/tags', asyncHandler(async (req, res) => {
    const body = parseInput(tagInputSchema, req.body);
    const tag = await tagService.createTag(body);
    res.status(201).json(tag);
  }));

  router.get('/tags/:id', asyncHandler(async (req, res) => {
    const tag = await tagService.getTagById(parseId(req.params.id));
    if (!tag) throw new NotFoundError('Tag not found');
    res.json(tag);
  }));

  router.put('/tags/:id', asyncHandler(async (req, res) => {
    const body = parseInput(tagInputSchema.partial(), req.body);
    const tag = await tagService.updateTag(parseId(req.params.id), body);
    if (!tag) throw new NotFoundError('Tag not found');
    res.json(tag);
  }));

  router.delete('/tags/:id', asyncHandler(async (req, res) => {
    const deleted = await tagService.deleteTag(parseId(req.params.id));
    if (!deleted) throw new NotFoundError('Tag not found');
    res.status(204).send();
  }));

  return router;
}
