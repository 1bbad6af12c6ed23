import { describe, expect, it } from "vitest";
import { escapeHtml, slugify } from "./string";

describe("escapeHtml", () => {
    it("escapes markup and quotes", () => {
        expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
            "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;"
        );
    });

    it("returns plain text unchanged", () => {
        expect(escapeHtml("hello")).toBe("hello");
        expect(escapeHtml("")).toBe("");
    });
});

describe("slugify", () => {
    it("lowercases and dashes", () => {
        expect(slugify("Hello World")).toBe("hello-world");
        expect(slugify("Getting Started: Step 1")).toBe("getting-started-step-1");
    });

    it("removes diacritics", () => {
        expect(slugify("Café Crème")).toBe("cafe-creme");
    });

    it("trims leading and trailing dashes", () => {
        expect(slugify("--hello--")).toBe("hello");
    });

    it("falls back to a fixed slug when nothing alphanumeric remains", () => {
        expect(slugify("@#$%")).toBe("section");
        expect(slugify("介绍")).toBe("section");
    });
});
