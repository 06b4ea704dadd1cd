import express, { Router } from 'express';
import type { Services } from '../services/index';
import type { Auth } from '../auth';
import type { Blog, Post, User } from '../types/blog';
import { asyncHandler, currentUser, requireAuth, type AuthenticatedRequest } from '../middleware/auth';
import { ForbiddenError, NotFoundError } from '../lib/errors';
import { parseId, parseInput } from '../lib/validation';
import { USER_ALREADY_HAS_BLOG } from '../services/blogService';
import {
  createOwnBlogSchema,
  createOwnPostSchema,
  paginationSchema,
  tagInputSchema,
  updateBlogSchema,
  updateOwnPostSchema,
} from '../schemas/blog';

const BLOG_ONE_PER_USER_MESSAGE =
  'Each user can only have one blog. Use PUT or PATCH to update your existing blog.';

function canManageBlog(user: User, blog: Blog): boolean {
  return user.isSuperuser || blog.userId === user.id;
}

function canManagePost(user: User, post: Post): boolean {
  return canManageBlog(user, post.blog);
}

function requireSuperuser(user: User): void {
  if (!user.isSuperuser) {
    throw new ForbiddenError();
  }
}

/**
 * JSON API for signed-in members: their blog, their posts, and read access
 * to everyone's posts and tags. Superusers may manage anything.
 */
export function createApiRouter(auth: Auth, services: Services): Router {
  const { userService, blogService, postService, tagService } = services;
  const router: Router = express.Router();

  router.use(requireAuth(auth, userService));

  router.get('/', (req, res) => {
    res.json({
      users: '/api/users',
      blogs: '/api/blogs',
      posts: '/api/posts',
      publishedPosts: '/api/posts/published',
      postsByTag: '/api/posts/by-tag',
      tags: '/api/tags',
      auth: '/api/auth',
    });
  });

  // Users: superusers see everyone, members see themselves

  router.get('/users', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const user = currentUser(req);
    res.json(user.isSuperuser ? await userService.listUsers() : [user]);
  }));

  router.get('/users/:id', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const user = currentUser(req);
    if (!user.isSuperuser && req.params.id !== user.id) {
      throw new NotFoundError('User not found');
    }
    const found = await userService.getUserById(req.params.id);
    if (!found) throw new NotFoundError('User not found');
    res.json(found);
  }));

  // Blogs: superusers see every blog, members their own

  const findVisibleBlog = async (user: User, id: number): Promise<Blog> => {
    const blog = await blogService.getBlogById(id);
    if (!blog || !canManageBlog(user, blog)) {
      throw new NotFoundError('Blog not found');
    }
    return blog;
  };

  router.get('/blogs', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const user = currentUser(req);
    res.json(await blogService.listBlogs(user.isSuperuser ? {} : { user: user.id }));
  }));

  router.post('/blogs', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const user = currentUser(req);
    const existing = await blogService.getBlogForUser(user.id);
    if (existing) {
      res.status(400).json({
        error: {
          message: USER_ALREADY_HAS_BLOG,
          status: 400,
          detail: BLOG_ONE_PER_USER_MESSAGE,
          existingBlogId: existing.id,
          existingBlogUrl: `/api/blogs/${existing.id}`,
        },
      });
      return;
    }

    const body = parseInput(createOwnBlogSchema, req.body);
    const blog = await blogService.createBlog({ ...body, userId: user.id });
    res.status(201).json(blog);
  }));

  router.get('/blogs/:id', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    res.json(await findVisibleBlog(currentUser(req), parseId(req.params.id)));
  }));

  const updateBlog = asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const blog = await findVisibleBlog(currentUser(req), parseId(req.params.id));
    const schema = req.method === 'PUT' ? updateBlogSchema.required({ title: true }) : updateBlogSchema;
    const body = parseInput(schema, req.body);
    const updated = await blogService.updateBlog(blog.id, body);
    if (!updated) throw new NotFoundError('Blog not found');
    res.json(updated);
  });
  router.put('/blogs/:id', updateBlog);
  router.patch('/blogs/:id', updateBlog);

  router.delete('/blogs/:id', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const blog = await findVisibleBlog(currentUser(req), parseId(req.params.id));
    await blogService.deleteBlog(blog.id);
    res.status(204).send();
  }));

  // Posts: everyone reads, owners and superusers write

  router.get('/posts', asyncHandler(async (req, res) => {
    const pagination = parseInput(paginationSchema, req.query);
    res.json(await postService.listPostsPaginated(pagination));
  }));

  router.get('/posts/published', asyncHandler(async (req, res) => {
    const pagination = parseInput(paginationSchema, req.query);
    res.json(await postService.getPublishedPostsPaginated(pagination));
  }));

  router.get('/posts/by-tag', asyncHandler(async (req, res) => {
    const pagination = parseInput(paginationSchema, req.query);
    const tagParam = typeof req.query.tag === 'string' ? req.query.tag.trim() : '';
    if (!tagParam) {
      res.json(await postService.listPostsPaginated(pagination));
      return;
    }
    const tagIds = await tagService.resolveTagIds(tagParam);
    res.json(await postService.listPostsByTagIds(tagIds, pagination));
  }));

  router.post('/posts', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const user = currentUser(req);
    const body = parseInput(createOwnPostSchema, req.body);
    const blog = await blogService.ensureBlogForUser(user);
    const post = await postService.createPost({ ...body, blogId: blog.id });
    res.status(201).json(post);
  }));

  router.get('/posts/:id', asyncHandler(async (req, res) => {
    const post = await postService.getPostById(parseId(req.params.id));
    if (!post) throw new NotFoundError('Post not found');
    res.json(post);
  }));

  const findManageablePost = async (user: User, id: number): Promise<Post> => {
    const post = await postService.getPostById(id);
    if (!post) throw new NotFoundError('Post not found');
    if (!canManagePost(user, post)) throw new ForbiddenError();
    return post;
  };

  const updatePost = asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const post = await findManageablePost(currentUser(req), parseId(req.params.id));
    const schema = req.method === 'PUT' ? createOwnPostSchema : updateOwnPostSchema;
    const body = parseInput(schema, req.body);
    const updated = await postService.updatePost(post.id, body);
    if (!updated) throw new NotFoundError('Post not found');
    res.json(updated);
  });
  router.put('/posts/:id', updatePost);
  router.patch('/posts/:id', updatePost);

  router.delete('/posts/:id', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    const post = await findManageablePost(currentUser(req), parseId(req.params.id));
    await postService.deletePost(post.id);
    res.status(204).send();
  }));

  // Tags: everyone reads, superusers write

  router.get('/tags', asyncHandler(async (req, res) => {
    res.json(await tagService.listTags());
  }));

  router.get('/tags/:id', asyncHandler(async (req, res) => {
    const tag = await tagService.getTagById(parseId(req.params.id));
    if (!tag) throw new NotFoundError('Tag not found');
    res.json(tag);
  }));

  router.post('/tags', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    requireSuperuser(currentUser(req));
    const body = parseInput(tagInputSchema, req.body);
    res.status(201).json(await tagService.createTag(body));
  }));

  router.put('/tags/:id', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    requireSuperuser(currentUser(req));
    const body = parseInput(tagInputSchema, req.body);
    const tag = await tagService.updateTag(parseId(req.params.id), body);
    if (!tag) throw new NotFoundError('Tag not found');
    res.json(tag);
  }));

  router.delete('/tags/:id', asyncHandler<AuthenticatedRequest>(async (req, res) => {
    requireSuperuser(currentUser(req));
    const deleted = await tagService.deleteTag(parseId(req.params.id));
    if (!deleted) throw new NotFoundError('Tag not found');
    res.status(204).send();
  }));

  return router;
}

