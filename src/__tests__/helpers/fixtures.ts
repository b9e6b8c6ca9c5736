/**
 * Test Fixtures
 * Reusable test data
 */

export const testHtml = `
<!DOCTYPE html>
<html>
<head>
  <title>Test Page</title>
  <meta name="description" content="Test description">
  <link rel="canonical" href="https://example.com/test">
  <meta property="og:title" content="OG Test">
  <meta name="twitter:card" content="summary">
</head>
<body>
  <header><a href="/">Home</a></header>
  <nav><a href="/about">About</a></nav>
  <main>
    <h1>Test Heading</h1>
    <p>Test paragraph content.</p>
    <p>Main content <a href="/guide#intro">area</a>.</p>
  </main>
  <footer><a href="https://other.example.org/">Partner</a></footer>
  <script>console.log('test');</script>
</body>
</html>
`;

export interface TestPageOptions {
  title?: string;
  navLinks?: string[];
  bodyLinks?: string[];
  body?: string;
}

/**
 * A page with a shared navigation block and some contextual links
 */
export function sitePage(options: TestPageOptions = {}): string {
  const anchors = (links: string[]) => links.map((href) => `<a href="${href}">${href}</a>`).join('\n');

  return `<!DOCTYPE html>
<html>
<head><title>${options.title ?? 'Page'}</title></head>
<body>
  <nav>${anchors(options.navLinks ?? [])}</nav>
  <main>
    <p>${options.body ?? 'Body text.'}</p>
    ${anchors(options.bodyLinks ?? [])}
  </main>
</body>
</html>`;
}

export function urlSet(urls: string[]): string {
  const entries = urls.map((url) => `  <url><loc>${url}</loc></url>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</urlset>`;
}

export function sitemapIndex(sitemaps: string[]): string {
  const entries = sitemaps.map((url) => `  <sitemap><loc>${url}</loc></sitemap>`).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries}
</sitemapindex>`;
}
