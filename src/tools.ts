import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { Logger } from "./logger.js";
import { ConfigurationError, SERVICE_KEY_REQUIRED_MESSAGE, type TyphoonService } from "./typhoonService.js";

// -------------------------- 입력 스키마 --------------------------

export const liveSummaryInput = {
    location: z
        .string()
        .nullish()
        .describe("지역명 (예: 서울, 부산광역시, 제주특별자치도). 없으면 전국 공통 요약"),
};

export const searchPastTyphoonsInput = {
    query: z.string().nullish().describe("태풍 이름 일부 (한글 또는 영문, 예: 힌남노, HINNAMNOR)"),
    year: z.number().int().nullish().describe("검색 연도 (예: 2022). 없으면 올해부터 거슬러 검색"),
};

export const pastTrackInput = {
    typSeq: z.coerce.number().int().describe("태풍번호 (search_past_typhoons 결과의 sequenceNumber)"),
    from_yyyymmdd: z.string().nullish().describe("조회 시작일 YYYYMMDD"),
    to_yyyymmdd: z.string().nullish().describe("조회 종료일 YYYYMMDD"),
};

const liveSummarySchema = z.object(liveSummaryInput);
const searchPastTyphoonsSchema = z.object(searchPastTyphoonsInput);
const pastTrackSchema = z.object(pastTrackInput);

export type LiveSummaryArgs = z.infer<typeof liveSummarySchema>;
export type SearchPastTyphoonsArgs = z.infer<typeof searchPastTyphoonsSchema>;
export type PastTrackArgs = z.infer<typeof pastTrackSchema>;

// -------------------------- 도구 목록 --------------------------

export const TOOL_DESCRIPTIONS = {
    get_live_typhoon_summary:
        "최근(기본: 3일 전~내일) 기준으로 현재/근접 태풍의 요약과 사용자의 지역 기준 영향 가능 시간대를 반환합니다.",
    search_past_typhoons:
        "연도 또는 이름 일부로 과거 태풍 후보를 검색해 목록을 반환합니다. 연도가 없으면 올해부터 거슬러 검색합니다.",
    get_past_typhoon_track:
        "지정한 태풍번호(typSeq)의 기간 내 경로 포인트(위경도/시각)를 반환합니다. 기간이 없으면 자동 추정합니다.",
} as const;

export type ToolName = keyof typeof TOOL_DESCRIPTIONS;

export type ToolDescriptor = {
    name: ToolName;
    description: string;
    inputSchema: ReturnType<typeof zodToJsonSchema>;
};

export class ToolArgumentsError extends Error {
    constructor(readonly tool: string, readonly issues: z.ZodIssue[]) {
        super(`Invalid arguments for ${tool}: ${issues.map((i) => `${i.path.join(".") || "(root)"} ${i.message}`).join("; ")}`);
        this.name = "ToolArgumentsError";
    }
}

function parseArgs<T extends z.ZodTypeAny>(tool: string, schema: T, raw: unknown): z.infer<T> {
    const parsed = schema.safeParse(raw ?? {});
    if (!parsed.success) {
        throw new ToolArgumentsError(tool, parsed.error.issues);
    }
    return parsed.data;
}

function toolDescriptor(name: ToolName, schema: z.ZodTypeAny): ToolDescriptor {
    return {
        name,
        description: TOOL_DESCRIPTIONS[name],
        inputSchema: zodToJsonSchema(schema, { $refStrategy: "none" }),
    };
}

// -------------------------- 응답 --------------------------

function jsonResult(value: unknown): CallToolResult {
    return {
        content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
    };
}

/**
 * 도구 실행 중 예외는 MCP 표준 에러 형태({ isError: true })로 돌려주고,
 * 원인은 로그에 남긴다.
 */
export class TyphoonTools {
    constructor(
        private readonly service: TyphoonService,
        private readonly logger: Logger,
        private readonly options: { debugErrors: boolean } = { debugErrors: false },
    ) {}

    list(): ToolDescriptor[] {
        return [
            toolDescriptor("get_live_typhoon_summary", liveSummarySchema),
            toolDescriptor("search_past_typhoons", searchPastTyphoonsSchema),
            toolDescriptor("get_past_typhoon_track", pastTrackSchema),
        ];
    }

    /** 이름으로 도구 호출. 모르는 도구면 null. */
    async call(name: string, rawArgs: unknown): Promise<CallToolResult | null> {
        switch (name) {
            case "get_live_typhoon_summary":
                return this.liveSummary(parseArgs(name, liveSummarySchema, rawArgs));
            case "search_past_typhoons":
                return this.searchPastTyphoons(parseArgs(name, searchPastTyphoonsSchema, rawArgs));
            case "get_past_typhoon_track":
                return this.pastTrack(parseArgs(name, pastTrackSchema, rawArgs));
            default:
                return null;
        }
    }

    liveSummary(args: LiveSummaryArgs): Promise<CallToolResult> {
        return this.run("get_live_typhoon_summary", args, () => this.service.liveSummary(args.location ?? undefined));
    }

    searchPastTyphoons(args: SearchPastTyphoonsArgs): Promise<CallToolResult> {
        return this.run("search_past_typhoons", args, () => this.service.searchPastTyphoons(args.query ?? undefined, args.year ?? undefined));
    }

    pastTrack(args: PastTrackArgs): Promise<CallToolResult> {
        return this.run("get_past_typhoon_track", args, () =>
            this.service.pastTrack(args.typSeq, args.from_yyyymmdd ?? undefined, args.to_yyyymmdd ?? undefined),
        );
    }

    private async run(tool: ToolName, args: unknown, fn: () => Promise<unknown>): Promise<CallToolResult> {
        try {
            return jsonResult(await fn());
        } catch (err) {
            if (err instanceof ConfigurationError) {
                this.logger.warn({ tool }, err.message);
                return this.errorResult(SERVICE_KEY_REQUIRED_MESSAGE, err.message);
            }

            this.logger.error({ err, tool, args }, "[TOOL ERROR] tool call failed");
            const message = err instanceof Error ? err.message : String(err);
            const stack = err instanceof Error && err.stack ? `\n\ntrace:\n${err.stack}` : "";
            return this.errorResult("error while calling tool", `tool=${tool}\nerr=${message}${stack}`);
        }
    }

    private errorResult(message: string, detail?: string): CallToolResult {
        const text = detail && this.options.debugErrors ? `${message}\n\n[detail]\n${detail}` : message;
        return {
            content: [{ type: "text", text }],
            isError: true,
        };
    }
}
