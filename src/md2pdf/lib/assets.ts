import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const themesDir = join(dirname(fileURLToPath(import.meta.url)), "..", "themes");

export const CDN = {
    highlightCss: "https://cdnjs.cloudflare.com/ajax/libs/highlight.js/11.9.0/styles/github.min.css",
    githubMarkdownCss: "https://cdnjs.cloudflare.com/ajax/libs/github-markdown-css/5.2.0/github-markdown.min.css",
    mermaidJs: "https://cdn.jsdelivr.net/npm/mermaid@10/dist/mermaid.min.js",
    mathjaxJs: "https://cdn.jsdelivr.net/npm/mathjax@3/es5/tex-mml-chtml.js",
    katexCss: "https://cdn.jsdelivr.net/npm/katex@0.16.9/dist/katex.min.css",
    katexJs: "https://cdn.jsdelivr.net/npm/katex@0.16.9/dist/katex.min.js",
    katexAutoRenderJs: "https://cdn.jsdelivr.net/npm/katex@0.16.9/dist/contrib/auto-render.min.js",
} as const;

export type StylesheetName = "base" | "mpe";

const stylesheets = new Map<StylesheetName, string>();

/**
 * Read a bundled stylesheet from the themes directory (cached after first read).
 */
export function loadStylesheet(name: StylesheetName): string {
    let css = stylesheets.get(name);
    if (css === undefined) {
        css = readFileSync(join(themesDir, `${name}.css`), "utf-8");
        stylesheets.set(name, css);
    }
    return css;
}
