/**
 * Markdown list normalization applied before HTML conversion.
 *
 * Parsers without a blank line before a list (or with an under-indented
 * sub-list under a numbered item) fold list items into the preceding
 * paragraph. This pass inserts the separators and repairs indentation,
 * leaving fenced code untouched.
 */

export type FenceState = "normal" | "in-fence";

export type ListLineKind = "nested-bullet" | "nested-numbered" | "top-bullet" | "top-numbered";

const FENCE_RE = /^\s*```/;
const NESTED_BULLET_RE = /^\s{2,}[*+-]\s+/;
const NESTED_NUMBERED_RE = /^\s{2,}\d+[.)]\s+/;
const TOP_BULLET_RE = /^[*+-]\s+/;
const TOP_NUMBERED_RE = /^\d+[.)]\s+/;

const NESTED_UNDER_NUMBERED_INDENT = "      ";

export function isFenceLine(line: string): boolean {
    return FENCE_RE.test(line);
}

export function classifyListLine(line: string): ListLineKind | null {
    if (NESTED_BULLET_RE.test(line)) return "nested-bullet";
    if (NESTED_NUMBERED_RE.test(line)) return "nested-numbered";
    if (TOP_BULLET_RE.test(line)) return "top-bullet";
    if (TOP_NUMBERED_RE.test(line)) return "top-numbered";
    return null;
}

/** A top-level numbered predecessor still gets a separator, the other list kinds don't. */
function suppressesSeparator(kind: ListLineKind | null): boolean {
    return kind === "nested-bullet" || kind === "nested-numbered" || kind === "top-bullet";
}

function splitLines(text: string): string[] {
    const lines = text.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === "") {
        lines.pop();
    }
    return lines;
}

export function normalizeLists(text: string): string {
    const out: string[] = [];
    let state: FenceState = "normal";
    let previous = "";

    for (const original of splitLines(text)) {
        let line = original;

        if (isFenceLine(line)) {
            state = state === "normal" ? "in-fence" : "normal";
        } else if (state === "normal") {
            const kind = classifyListLine(line);
            const previousKind = classifyListLine(previous);

            if (kind && previous.trim() !== "" && !suppressesSeparator(previousKind)) {
                out.push("");
            }

            if (kind === "nested-bullet" && previousKind === "top-numbered") {
                const indent = line.length - line.trimStart().length;
                if (indent < NESTED_UNDER_NUMBERED_INDENT.length) {
                    line = line.replace(/^\s+/, NESTED_UNDER_NUMBERED_INDENT);
                }
            }

            if (kind === "top-bullet") {
                line = line.replace(/^\*\s+/, "- ");
            }
        }

        out.push(line);
        previous = line;
    }

    return out.join("\n");
}
