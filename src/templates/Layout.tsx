import type { ComponentChildren, JSX } from "preact";

export const SITE_NAME = "Inkwell";

export interface LayoutProps {
  title: string;
  description?: string;
  children: ComponentChildren;
}

/**
 * Page shell shared by the public pages
 */
export const Layout = ({ title, description, children }: LayoutProps): JSX.Element => {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        {description && <meta name="description" content={description} />}
        <link rel="stylesheet" href="/styles.css" />
      </head>
      <body>
        <header className="site-header">
          <a href="/blog/" className="site-title">{SITE_NAME}</a>
        </header>
        <main className="container">{children}</main>
      </body>
    </html>
  );
};
