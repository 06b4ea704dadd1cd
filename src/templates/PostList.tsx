import type { JSX } from "preact";
import type { Post } from "../types/blog";
import { Layout, SITE_NAME } from "./Layout";
import { PostMeta, TagList } from "./PostMeta";

export interface PostListProps {
  posts: Post[];
}

export function postUrl(post: Pick<Post, "slug">): string {
  return `/blog/${encodeURIComponent(post.slug)}/`;
}

/**
 * Public list of published posts
 */
export const PostListTemplate = ({ posts }: PostListProps): JSX.Element => {
  return (
    <Layout title={`Posts | ${SITE_NAME}`} description={`Browse ${posts.length} published posts`}>
      <h1>Latest posts</h1>
      {posts.length === 0 ? (
        <p className="empty">No posts published yet.</p>
      ) : (
        <ol className="post-list">
          {posts.map((post) => (
            <li key={post.id} className="post-summary">
              <h2><a href={postUrl(post)}>{post.title}</a></h2>
              <PostMeta post={post} />
              {post.excerpt && <p className="excerpt">{post.excerpt}</p>}
              <TagList post={post} />
            </li>
          ))}
        </ol>
      )}
    </Layout>
  );
};
