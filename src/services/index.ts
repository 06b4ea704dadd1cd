import type { Database } from '../db/index';
import { BlogService } from './blogService';
import { PostService } from './postService';
import { TagService } from './tagService';
import { UserService } from './userService';

export interface Services {
  db: Database;
  userService: UserService;
  blogService: BlogService;
  postService: PostService;
  tagService: TagService;
}

export function createServices(db: Database): Services {
  return {
    db,
    userService: new UserService(db),
    blogService: new BlogService(db),
    postService: new PostService(db),
    tagService: new TagService(db),
  };
}
