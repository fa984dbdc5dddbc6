import { Article, Digest } from './types';

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderArticle(article: Article): string {
  const summary = article.summary
    ? `\n        <p class="summary">${escapeHtml(article.summary)}</p>`
    : '';
  return `      <article class="entry">
        <h3><a href="${escapeHtml(article.link)}" target="_blank" rel="noopener">${escapeHtml(article.title)}</a></h3>
        <div class="meta"><span class="source">${escapeHtml(article.source)}</span> · <time>${escapeHtml(article.publishedDisplay)}</time></div>${summary}
      </article>`;
}

function renderCategory(category: string, articles: readonly Article[]): string {
  return `    <section class="category">
      <h2>${escapeHtml(category)} <span class="count">(${articles.length})</span></h2>
${articles.map(renderArticle).join('\n')}
    </section>`;
}

const STYLE = `
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", sans-serif; max-width: 760px; margin: 0 auto; padding: 24px; color: #222; background: #fafafa; }
    header { border-bottom: 1px solid #ddd; margin-bottom: 24px; }
    h2 { font-size: 20px; margin-top: 32px; }
    h2 .count { color: #888; font-weight: normal; font-size: 14px; }
    .entry { background: #fff; border: 1px solid #eee; border-radius: 6px; padding: 12px 16px; margin-bottom: 12px; }
    .entry h3 { font-size: 16px; margin: 0 0 4px; }
    .entry a { color: #0b57d0; text-decoration: none; }
    .meta { font-size: 13px; color: #666; }
    .summary { font-size: 14px; color: #444; margin: 8px 0 0; }
    .empty { color: #666; }`;

/** Full static HTML page for a digest. */
export function renderDigestHtml(digest: Digest): string {
  const sections = [...digest.articlesByCategory]
    .map(([category, articles]) => renderCategory(category, articles))
    .join('\n');

  const body = digest.totalCount > 0
    ? sections
    : `    <p class="empty">No articles in the last ${digest.maxAgeHours} hours.</p>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(digest.title)}</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <header>
    <h1>${escapeHtml(digest.title)}</h1>
    <p class="generated">${escapeHtml(digest.generatedAt)}</p>
    <p class="stats">${digest.totalCount} articles from the last ${digest.maxAgeHours} hours</p>
  </header>
  <main>
${body}
  </main>
</body>
</html>
`;
}
