import type { JSX } from "preact";
import type { Post } from "../types/blog";

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Blog name and publication date line
 */
export const PostMeta = ({ post }: { post: Post }): JSX.Element => {
  const date = post.publishedAt ?? post.createdAt;
  return (
    <p className="post-meta">
      <span className="post-blog">{post.blog.title}</span>
      {" · "}
      <time dateTime={date.toISOString()}>{formatDate(date)}</time>
    </p>
  );
};

export const TagList = ({ post }: { post: Post }): JSX.Element | null => {
  if (post.tags.length === 0) return null;
  return (
    <ul className="tags">
      {post.tags.map((tag) => (
        <li key={tag.id}>{tag.name}</li>
      ))}
    </ul>
  );
};
