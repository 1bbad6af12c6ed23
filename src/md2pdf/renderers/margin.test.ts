import { describe, expect, it } from "vitest";
import { parseMargin } from "./margin";

describe("parseMargin", () => {
    it("applies a single value to every side", () => {
        expect(parseMargin("15mm")).toEqual({ top: "15mm", right: "15mm", bottom: "15mm", left: "15mm" });
    });

    it("follows CSS shorthand for two and three values", () => {
        expect(parseMargin("10mm 20mm")).toEqual({ top: "10mm", right: "20mm", bottom: "10mm", left: "20mm" });
        expect(parseMargin("1in 2in 3in")).toEqual({ top: "1in", right: "2in", bottom: "3in", left: "2in" });
    });

    it("takes four values in clockwise order", () => {
        expect(parseMargin("1mm 2mm 3mm 4mm")).toEqual({ top: "1mm", right: "2mm", bottom: "3mm", left: "4mm" });
    });

    it("ignores extra whitespace", () => {
        expect(parseMargin("  5mm   6mm ")).toEqual({ top: "5mm", right: "6mm", bottom: "5mm", left: "6mm" });
    });

    it("defaults to 20mm when empty", () => {
        expect(parseMargin("")).toEqual({ top: "20mm", right: "20mm", bottom: "20mm", left: "20mm" });
    });
});
