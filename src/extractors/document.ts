import { load, type CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import { collapseWhitespace } from './patterns.js';

export const HEADING_SELECTOR = 'h1, h2, h3, h4, h5, h6';

const IGNORED_SELECTOR = 'script, style, noscript, template';

// Elements whose text must not run into the text of their neighbours
const BLOCK_ELEMENTS = new Set([
  'address', 'article', 'aside', 'blockquote', 'body', 'dd', 'details', 'div', 'dl', 'dt',
  'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header',
  'hr', 'html', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'summary', 'table',
  'tbody', 'td', 'tfoot', 'th', 'thead', 'tr', 'ul',
]);

/**
 * Parse HTML into the document shared by all strategies, without script and style content.
 * The parser is lenient: malformed markup is repaired, never rejected.
 */
export function parseDocument(html: string): CheerioAPI {
  const $ = load(html);
  $(IGNORED_SELECTOR).remove();
  return $;
}

/**
 * Text as a reader sees it: block elements on their own lines, `<br>` as a line break
 */
export function visibleText(nodes: readonly AnyNode[]): string {
  let text = '';
  // Walked with an explicit stack: pages can nest deeper than the call stack allows.
  // Strings on the stack are line breaks still owed after a block element closes.
  const pending: Array<AnyNode | string> = [...nodes].reverse();

  for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
    if (typeof item === 'string') {
      text += item;
    } else if (isText(item)) {
      text += item.data;
    } else if (isTag(item)) {
      if (item.name === 'br') {
        text += '\n';
        continue;
      }
      if (BLOCK_ELEMENTS.has(item.name)) {
        text += '\n';
        pending.push('\n');
      }
      pushChildren(pending, item.children);
    } else if (hasChildren(item)) {
      pushChildren(pending, item.children);
    }
  }

  return text;
}

function pushChildren(pending: Array<AnyNode | string>, children: readonly AnyNode[]): void {
  for (let index = children.length - 1; index >= 0; index--) {
    pending.push(children[index]);
  }
}

/**
 * Text of the closest heading before the element, looking at earlier siblings
 * of the element and then of each ancestor
 */
export function nearestHeadingText($: CheerioAPI, element: Element): string {
  for (let node: Element | null = element; node; node = parentElement(node)) {
    const heading = $(node).prevAll(HEADING_SELECTOR).first();
    if (heading.length > 0) {
      return collapseWhitespace(heading.text());
    }
  }
  return '';
}

function parentElement(node: Element): Element | null {
  return node.parent && isTag(node.parent) ? node.parent : null;
}
