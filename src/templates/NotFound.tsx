import type { JSX } from "preact";
import { Layout, SITE_NAME } from "./Layout";

export const NotFoundTemplate = ({ message }: { message: string }): JSX.Element => {
  return (
    <Layout title={`Not found | ${SITE_NAME}`}>
      <h1>Not found</h1>
      <p>{message}</p>
      <a href="/blog/">All posts</a>
    </Layout>
  );
};
