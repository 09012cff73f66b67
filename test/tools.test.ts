import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describe, expect, it } from "vitest";
import { formatIsoDate } from "../src/lib/time.js";
import { ToolArgumentsError } from "../src/tools.js";
import { createFakeSource, createTestTools } from "./testUtils/fakes.js";

function textOf(result: CallToolResult | null): string {
    const first = result?.content[0];
    if (first?.type !== "text") throw new Error("expected a text content block");
    return first.text;
}

describe("TyphoonTools", () => {
    it("lists the three tools with JSON schemas", () => {
        const tools = createTestTools({ status: "configured", source: createFakeSource() });
        const listed = tools.list();

        expect(listed.map((t) => t.name)).toEqual([
            "get_live_typhoon_summary",
            "search_past_typhoons",
            "get_past_typhoon_track",
        ]);
        expect(listed[2]?.inputSchema).toMatchObject({
            type: "object",
            properties: {
                typSeq: { type: "integer" },
                from_yyyymmdd: { type: ["string", "null"] },
                to_yyyymmdd: { type: ["string", "null"] },
            },
            required: ["typSeq"],
        });
    });

    it("returns the service result as JSON text", async () => {
        const tools = createTestTools({ status: "configured", source: createFakeSource() });

        const result = await tools.call("get_past_typhoon_track", { typSeq: "11", from_yyyymmdd: "20240828", to_yyyymmdd: "20240903" });

        expect(result?.isError).toBeUndefined();
        expect(JSON.parse(textOf(result))).toMatchObject({
            ok: true,
            typSeq: 11,
            range: { from: "2024-08-28", to: "2024-09-03" },
            count: 1,
        });
    });

    it("reports invalid caller input as a normal result", async () => {
        const tools = createTestTools({ status: "configured", source: createFakeSource() });

        const result = await tools.call("search_past_typhoons", {});

        expect(JSON.parse(textOf(result))).toEqual({ ok: false, message: "검색어(query) 또는 연도(year) 중 하나는 필요합니다." });
    });

    it("treats null optional arguments as omitted", async () => {
        const source = createFakeSource();
        const tools = createTestTools({ status: "configured", source });

        const search = await tools.call("search_past_typhoons", { query: "힌남노", year: null });

        expect(source.listUniqueTyphoonsInRange).toHaveBeenCalledTimes(1);
        const [from, to] = source.listUniqueTyphoonsInRange.mock.calls[0] ?? [];
        expect([from && formatIsoDate(from), to && formatIsoDate(to)]).toEqual(["2024-01-01", "2024-12-31"]);
        expect(JSON.parse(textOf(search))).toMatchObject({ ok: true, year: null, results: [{ sequenceNumber: 11 }] });

        const track = await tools.call("get_past_typhoon_track", { typSeq: 11, from_yyyymmdd: null, to_yyyymmdd: null });

        expect(track?.isError).toBeUndefined();
        expect(JSON.parse(textOf(track))).toMatchObject({ ok: true, range: { from: "2024-08-03", to: "2024-09-03" }, count: 1 });

        const live = await tools.call("get_live_typhoon_summary", { location: null });
        expect(JSON.parse(textOf(live))).toMatchObject({ location: { input: null, geocoded: null } });
    });

    it("rejects years before the archive starts", async () => {
        const source = createFakeSource();
        const tools = createTestTools({ status: "configured", source });

        const result = await tools.call("search_past_typhoons", { query: "힌남노", year: 1900 });

        expect(JSON.parse(textOf(result))).toEqual({ ok: false, message: "연도(year)는 1951년 이후여야 합니다." });
        expect(source.listUniqueTyphoonsInRange).not.toHaveBeenCalled();
    });

    it("returns null for an unknown tool", async () => {
        const tools = createTestTools({ status: "configured", source: createFakeSource() });
        expect(await tools.call("get_weather", {})).toBeNull();
    });

    it("raises ToolArgumentsError for arguments that fail validation", async () => {
        const tools = createTestTools({ status: "configured", source: createFakeSource() });

        await expect(tools.call("get_past_typhoon_track", { typSeq: "eleven" })).rejects.toBeInstanceOf(ToolArgumentsError);
        await expect(tools.call("get_past_typhoon_track", undefined)).rejects.toThrow(/typSeq/);
    });

    it("explains a missing service key", async () => {
        const tools = createTestTools({ status: "unconfigured", reason: "no key" });

        const result = await tools.call("get_live_typhoon_summary", {});

        expect(result?.isError).toBe(true);
        expect(textOf(result)).toBe("DATA_GO_KR_SERVICE_KEY 설정이 필요합니다.");
    });

    it("turns upstream failures into tool errors with optional detail", async () => {
        const source = createFakeSource();
        source.listUniqueTyphoonsInRange.mockRejectedValue(new Error("boom"));

        const quiet = await createTestTools({ status: "configured", source }).call("get_live_typhoon_summary", {});
        expect(quiet?.isError).toBe(true);
        expect(textOf(quiet)).toBe("error while calling tool");

        const verbose = await createTestTools({ status: "configured", source }, { debugErrors: true }).call("get_live_typhoon_summary", {});
        expect(textOf(verbose).startsWith("error while calling tool\n\n[detail]\ntool=get_live_typhoon_summary\nerr=boom")).toBe(true);
    });
});
