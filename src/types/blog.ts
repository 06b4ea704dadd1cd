export interface User {
  id: string;
  name: string;
  email: string;
  username: string;
  isStaff: boolean;
  isSuperuser: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type UserSummary = Pick<User, 'id' | 'username' | 'name' | 'email'>;

export interface Tag {
  id: number;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface TagWithCount extends Tag {
  postsCount: number;
}

export interface Blog {
  id: number;
  userId: string;
  title: string;
  bio: string;
  createdAt: Date;
  updatedAt: Date;
  user: UserSummary;
}

export interface Post {
  id: number;
  blogId: number;
  title: string;
  slug: string;
  content: string; // HTML
  excerpt: string;
  cover: string | null;
  isPublished: boolean;
  createdAt: Date;
  updatedAt: Date;
  publishedAt: Date | null;
  tags: Tag[]; // populated by PostService
  blog: Blog;
}

export interface PaginatedPosts {
  posts: Post[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}
