import express, { Router } from 'express';
import { h } from 'preact';
import type { PostService } from '../services/postService';
import { asyncHandler } from '../middleware/auth';
import { renderPage } from '../templates/render';
import { PostListTemplate } from '../templates/PostList';
import { PostDetailTemplate } from '../templates/PostDetail';
import { NotFoundTemplate } from '../templates/NotFound';

/**
 * Public pages: the list of published posts and a post by slug.
 */
export function createBlogRouter(postService: PostService): Router {
  const router: Router = express.Router();

  // GET /blog/ - published posts, newest first
  router.get('/', asyncHandler(async (req, res) => {
    const posts = await postService.getPublishedPosts();
    res.type('html').send(renderPage(h(PostListTemplate, { posts })));
  }));

  // GET /blog/:slug/ - a published post
  router.get('/:slug', asyncHandler(async (req, res) => {
    const post = await postService.getPublishedPostBySlug(req.params.slug);
    if (!post) {
      res
        .status(404)
        .type('html')
        .send(renderPage(h(NotFoundTemplate, { message: 'No published post matches this address.' })));
      return;
    }
    res.type('html').send(renderPage(h(PostDetailTemplate, { post })));
  }));

  return router;
}
