import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';

export interface ExtractedPage {
  title: string;
  text: string;
  /** Whether Readability found an article body (otherwise the cleaned page text is used) */
  readable: boolean;
}

const MIN_ARTICLE_CHARS = 200;

const UNWANTED_SELECTORS = ['script', 'style', 'nav', 'footer', 'header', 'aside', 'iframe', 'noscript', 'form', '.advertisement', '.ad', '.social-share', '.comments', '.cookie-banner'];

/**
 * Extract readable text from an HTML page: Readability first, falling back
 * to the page body with navigation and boilerplate removed.
 */
export function extractPageText(html: string, url?: string, maxLength = 10_000): ExtractedPage {
  const article = new Readability(new JSDOM(html, { url }).window.document).parse();
  const articleText = normalizeWhitespace(article?.textContent ?? '');

  if (article && articleText.length >= MIN_ARTICLE_CHARS) {
    return { title: article.title ?? '', text: articleText.slice(0, maxLength), readable: true };
  }

  const dom = new JSDOM(html, { url });
  const document = dom.window.document;
  for (const selector of UNWANTED_SELECTORS) {
    document.querySelectorAll(selector).forEach((el) => el.remove());
  }
  document.querySelectorAll('p, div, br, h1, h2, h3, h4, h5, h6, li, tr').forEach((el) => {
    if (el.tagName === 'BR') {
      el.replaceWith('\n');
    } else {
      el.insertAdjacentText('beforebegin', '\n');
      el.insertAdjacentText('afterend', '\n');
    }
  });

  const text = normalizeWhitespace(document.body?.textContent ?? '');
  return { title: document.title ?? '', text: text.slice(0, maxLength), readable: false };
}

export function normalizeWhitespace(text: string): string {
  return text
    .replace(/[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, '\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
