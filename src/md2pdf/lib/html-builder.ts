import { alert } from "@mdit/plugin-alert";
import { footnote } from "@mdit/plugin-footnote";
import { tex } from "@mdit/plugin-tex";
import hljs from "highlight.js";
import MarkdownIt from "markdown-it";
import anchor from "markdown-it-anchor";
import taskLists from "markdown-it-task-lists";
import { escapeHtml, slugify } from "@app/utils/string";
import type { MathMode, ThemeName } from "@app/md2pdf/types";
import { CDN, loadStylesheet } from "./assets";

export interface MarkdownFeatures {
    math: MathMode;
    mermaid: boolean;
}

export interface HtmlBuildOptions extends MarkdownFeatures {
    title: string;
    theme: ThemeName;
    pageSize: string;
    margin: string;
    /** Directory URL the document's relative links resolve against */
    baseUrl?: string;
    /** User stylesheet text, appended last */
    css?: string;
}

/**
 * Math is left for the in-page typesetter: wrap it in the delimiters MathJax and
 * KaTeX auto-render both look for, and keep markdown-it from touching its contents.
 */
function renderMath(content: string, displayMode: boolean): string {
    const escaped = escapeHtml(content);
    return displayMode
        ? `<div class="arithmatex">\\[${escaped}\\]</div>\n`
        : `<span class="arithmatex">\\(${escaped}\\)</span>`;
}

/**
 * Mermaid fences become the `div.mermaid` containers the Mermaid runtime renders in place.
 */
function createFencePlugin(md: MarkdownIt, features: MarkdownFeatures): void {
    const defaultFence = md.renderer.rules.fence;

    md.renderer.rules.fence = (tokens, idx, options, env, slf) => {
        const token = tokens[idx];
        const info = token.info.trim().toLowerCase();

        if (features.mermaid && info === "mermaid") {
            return `<div class="mermaid">${escapeHtml(token.content)}</div>\n`;
        }

        return defaultFence ? defaultFence(tokens, idx, options, env, slf) : slf.renderToken(tokens, idx, options);
    };
}

/**
 * Configure and create the markdown-it instance with plugins.
 */
export function createMarkdownRenderer(features: MarkdownFeatures): MarkdownIt {
    const md = new MarkdownIt({
        html: true,
        linkify: true,
        typographer: true,
        breaks: true,
        langPrefix: "hljs language-",
        // Highlight at build time so engines without JavaScript still get colors
        highlight: (code, lang) => {
            if (lang && hljs.getLanguage(lang)) {
                return hljs.highlight(code, { language: lang, ignoreIllegals: true }).value;
            }
            return "";
        },
    });

    md.use(taskLists, { enabled: true });
    md.use(alert, { deep: false });
    md.use(footnote);
    md.use(anchor, { slugify });

    if (features.math !== "none") {
        md.use(tex, { delimiters: "all", render: renderMath });
    }

    createFencePlugin(md, features);

    return md;
}

export function renderMarkdownBody(markdown: string, features: MarkdownFeatures): string {
    return createMarkdownRenderer(features).render(markdown);
}

export function pageRule(pageSize: string, margin: string): string {
    return `@page { size: ${pageSize}; margin: ${margin}; }`;
}

const KATEX_INIT = `<script>
window.addEventListener("load", function () {
  if (window.renderMathInElement) {
    renderMathInElement(document.body, {
      delimiters: [
        { left: "$$", right: "$$", display: true },
        { left: "$", right: "$", display: false },
        { left: "\\\\(", right: "\\\\)", display: false },
        { left: "\\\\[", right: "\\\\]", display: true }
      ]
    });
  }
});
</script>`;

const MERMAID_INIT = `<script>
window.addEventListener("load", function () {
  if (window.mermaid) { mermaid.initialize({ startOnLoad: true }); }
});
</script>`;

function headLinks(options: HtmlBuildOptions): string[] {
    const links = [`<link rel="stylesheet" href="${CDN.highlightCss}">`];
    if (options.theme === "github" || options.theme === "mpe") {
        links.push(`<link rel="stylesheet" href="${CDN.githubMarkdownCss}">`);
    }
    if (options.math === "katex") {
        links.push(`<link rel="stylesheet" href="${CDN.katexCss}">`);
    }
    return links;
}

function bodyScripts(options: HtmlBuildOptions): string[] {
    const scripts: string[] = [];
    if (options.mermaid) {
        scripts.push(`<script src="${CDN.mermaidJs}"></script>`, MERMAID_INIT);
    }
    if (options.math === "mathjax") {
        scripts.push(`<script src="${CDN.mathjaxJs}"></script>`);
    } else if (options.math === "katex") {
        scripts.push(
            `<script src="${CDN.katexJs}"></script>`,
            `<script src="${CDN.katexAutoRenderJs}"></script>`,
            KATEX_INIT
        );
    }
    return scripts;
}

function stylesheet(options: HtmlBuildOptions): string {
    const parts = [pageRule(options.pageSize, options.margin), loadStylesheet("base")];
    if (options.theme === "mpe") {
        parts.push(loadStylesheet("mpe"));
    }
    if (options.css) {
        parts.push(options.css);
    }
    return parts.join("\n");
}

/**
 * Render Markdown into a complete, print-ready HTML document.
 */
export function buildHtml(markdown: string, options: HtmlBuildOptions): string {
    const body = renderMarkdownBody(markdown, options);
    const head = [
        `<meta charset="utf-8">`,
        `<title>${escapeHtml(options.title)}</title>`,
        ...(options.baseUrl ? [`<base href="${escapeHtml(options.baseUrl)}">`] : []),
        ...headLinks(options),
        `<style>\n${stylesheet(options)}\n</style>`,
    ];

    return [
        "<!DOCTYPE html>",
        "<html>",
        "<head>",
        ...head,
        "</head>",
        "<body>",
        `<main class="markdown-body">\n${body}</main>`,
        ...bodyScripts(options),
        "</body>",
        "</html>",
        "",
    ].join("\n");
}
