import type { JSX } from "preact";
import type { Post } from "../types/blog";
import { Layout, SITE_NAME } from "./Layout";
import { PostMeta, TagList } from "./PostMeta";

export interface PostDetailProps {
  post: Post;
}

/**
 * Public post page; the body is the editor's HTML, rendered as-is
 */
export const PostDetailTemplate = ({ post }: PostDetailProps): JSX.Element => {
  return (
    <Layout title={`${post.title} | ${SITE_NAME}`} description={post.excerpt || undefined}>
      <article className="post">
        {post.cover && <img src={post.cover} alt={post.title} className="cover" />}
        <h1>{post.title}</h1>
        <PostMeta post={post} />
        <div className="post-content" dangerouslySetInnerHTML={{ __html: post.content }} />
        <TagList post={post} />
      </article>
      <a href="/blog/" className="back">All posts</a>
    </Layout>
  );
};
