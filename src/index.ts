import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServiceConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { SYSTEM_PROMPT_DESCRIPTION, SYSTEM_PROMPT_NAME, loadSystemPrompt } from "./prompts.js";
import { McpRpcDispatcher, SERVER_INFO } from "./rpc.js";
import {
    TOOL_DESCRIPTIONS,
    TyphoonTools,
    liveSummaryInput,
    pastTrackInput,
    searchPastTyphoonsInput,
} from "./tools.js";
import { createTyphoonService } from "./typhoonService.js";

export { loadConfig, type ServiceConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { buildHttpApp } from "./http.js";
export { McpRpcDispatcher } from "./rpc.js";
export { TyphoonTools } from "./tools.js";
export { TyphoonClient, UpstreamError, type TrackPoint, type TyphoonSummary } from "./typhoonClient.js";
export { ConfigurationError, TyphoonService, createTyphoonService } from "./typhoonService.js";
export { Geocoder, KOREA_REGION_CENTERS } from "./geocoder.js";

/** 설정에서 도구 묶음을 만든다. 인증키가 없어도 실패하지 않는다. */
export function createTools(config: ServiceConfig, logger: Logger): TyphoonTools {
    const service = createTyphoonService(config, logger);
    return new TyphoonTools(service, logger.child({ component: "tools" }), {
        debugErrors: config.DEBUG_TOOL_ERRORS,
    });
}

export function createDispatcher(tools: TyphoonTools, logger: Logger): McpRpcDispatcher {
    return new McpRpcDispatcher(
        tools,
        { name: SYSTEM_PROMPT_NAME, description: SYSTEM_PROMPT_DESCRIPTION, load: loadSystemPrompt },
        logger.child({ component: "rpc" }),
    );
}

/**
 * stdio 등 SDK 트랜스포트용 MCP 서버
 */
export default function createServer({
    tools,
}: {
    tools: TyphoonTools;
}) {
    const server = new McpServer(SERVER_INFO);

    server.tool(
        "get_live_typhoon_summary",
        TOOL_DESCRIPTIONS.get_live_typhoon_summary,
        liveSummaryInput,
        async (args) => tools.liveSummary(args),
    );

    server.tool(
        "search_past_typhoons",
        TOOL_DESCRIPTIONS.search_past_typhoons,
        searchPastTyphoonsInput,
        async (args) => tools.searchPastTyphoons(args),
    );

    server.tool(
        "get_past_typhoon_track",
        TOOL_DESCRIPTIONS.get_past_typhoon_track,
        pastTrackInput,
        async (args) => tools.pastTrack(args),
    );

    server.prompt(SYSTEM_PROMPT_NAME, SYSTEM_PROMPT_DESCRIPTION, () => ({
        messages: [
            { role: "user", content: { type: "text", text: loadSystemPrompt() } },
        ],
    }));

    return server;
}
