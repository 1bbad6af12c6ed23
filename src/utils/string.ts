/**
 * Shared string utilities.
 */

const HTML_ESCAPES: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#39;",
};

/**
 * Escape text for use inside HTML element content or a quoted attribute.
 */
export function escapeHtml(input: string): string {
    return input.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const EMPTY_SLUG = "section";

/**
 * Create a URL-safe, lowercase slug (used for heading anchors).
 * Normalizes diacritics, replaces non-alphanumeric runs with dashes and trims dashes.
 * Titles with nothing left after that (e.g. CJK-only headings) become "section".
 */
export function slugify(title: string): string {
    const slug = title
        .normalize("NFD")
        .replace(/[\u0300-\u036f]/g, "")
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, "-")
        .replace(/^-+|-+$/g, "");
    return slug || EMPTY_SLUG;
}
