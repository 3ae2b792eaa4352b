import * as cheerio from "cheerio";
import type { ExtractedContent } from "../types.js";

const NOISE_SELECTORS = [
  "script",
  "style",
  "noscript",
  "template",
  "svg",
  "iframe",
  "embed",
  "object",
  "meta",
  "link",
  "nav",
  "header",
  "footer",
  "aside",
  '[role="navigation"]',
  ".sidebar",
  ".navigation",
].join(", ");

// Cookie banners, popups and similar overlays, matched on class or id
const OVERLAY_KEYWORDS = ["cookie", "banner", "popup", "modal", "consent", "notification"];
const OVERLAY_SELECTORS = OVERLAY_KEYWORDS.flatMap((word) => [`[class*="${word}"]`, `[id*="${word}"]`]).join(", ");

const CONTENT_ROOTS = ["main", "article", '[role="main"]'];

const BLOCK_TAGS = [
  "address",
  "article",
  "blockquote",
  "dd",
  "div",
  "dl",
  "dt",
  "figcaption",
  "figure",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "hr",
  "li",
  "main",
  "ol",
  "p",
  "pre",
  "section",
  "table",
  "td",
  "th",
  "tr",
  "ul",
].join(", ");

// Private-use character marking line boundaries while whitespace is collapsed
const LINE_BREAK = "\uE000";

/**
 * Pull the title and readable text out of one HTML document.
 *
 * Block elements and `<br>` end a line; other whitespace collapses to a single
 * space. Returns empty text when nothing readable is left.
 */
export function extractContent(html: string): ExtractedContent {
  const $ = cheerio.load(html);

  const title = collapse($("title").first().text()) || collapse($("h1").first().text());

  $(NOISE_SELECTORS).remove();
  $(OVERLAY_SELECTORS).not("html, body, main").remove();

  $("br").replaceWith(LINE_BREAK);
  $(BLOCK_TAGS).each((_, element) => {
    $(element).prepend(LINE_BREAK).append(LINE_BREAK);
  });

  for (const selector of CONTENT_ROOTS) {
    const text = cleanText($(selector).first().text());
    if (text) {
      return { title, text };
    }
  }

  return { title, text: cleanText($("body").text()) };
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function cleanText(text: string): string {
  return text
    .replace(/\s+/g, " ")
    .split(LINE_BREAK)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}
