import Fastify from "fastify";
import type { ServiceConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { LATEST_PROTOCOL_VERSION, McpRpcDispatcher, RPC_ERROR, jsonRpcError } from "./rpc.js";

// CORS & 공통 헤더
const EXPOSE_HEADERS = "mcp-session-id, mcp-protocol-version";
const ALLOW_HEADERS = "authorization, content-type, mcp-session-id, mcp-protocol-version";
const ALLOW_METHODS = "POST, GET, OPTIONS";

export const SERVICE_NAME = "typhoon-guide-mcp";

export type HttpAppOptions = {
    config: Pick<ServiceConfig, "CORS_ALLOW_ORIGIN" | "allowedHosts">;
    dispatcher: McpRpcDispatcher;
    logger: Logger;
};

function headerValue(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

export function createCorsHeaders(origin: string | undefined, allowOrigin: string | undefined): Record<string, string> {
    const allowed = allowOrigin || "*";
    const allowedOrigins = allowed.split(",").map((o) => o.trim());
    return {
        "access-control-allow-origin": origin && allowedOrigins.includes(origin) ? origin : allowed,
        "access-control-allow-methods": ALLOW_METHODS,
        "access-control-allow-headers": ALLOW_HEADERS,
        "access-control-expose-headers": EXPOSE_HEADERS,
    };
}

/** Host 헤더 검사 (DNS rebinding 방지). 목록이 비어 있으면 모두 허용. */
export function isAllowedHost(host: string | undefined, allowedHosts: readonly string[]): boolean {
    if (allowedHosts.length === 0) return true;
    if (!host) return false;
    const normalized = host.toLowerCase();
    const hostname = normalized.replace(/:\d+$/, "");
    return allowedHosts.includes(normalized) || allowedHosts.includes(hostname);
}

export async function buildHttpApp({ config, dispatcher, logger }: HttpAppOptions) {
    const app = Fastify({ loggerInstance: logger });

    // JSON-RPC 파싱 오류(-32700)를 직접 응답하려고 본문을 문자열로 받는다.
    app.removeContentTypeParser("application/json");
    app.addContentTypeParser("application/json", { parseAs: "string" }, (_request, body, done) => {
        done(null, body);
    });

    app.addHook("onRequest", async (request, reply) => {
        reply.headers(createCorsHeaders(headerValue(request.headers.origin), config.CORS_ALLOW_ORIGIN));
        if (!isAllowedHost(headerValue(request.headers.host), config.allowedHosts)) {
            request.log.warn({ host: request.headers.host }, "rejected request for disallowed host");
            return reply.code(403).send({ error: "forbidden", message: "Host not allowed" });
        }
    });

    // CORS preflight
    app.options("*", async (_request, reply) => reply.code(200).send());

    app.get("/health", async () => ({ status: "ok", service: SERVICE_NAME }));

    // 서버 발신 SSE 스트림은 제공하지 않는다.
    app.get("/mcp", async (_request, reply) => reply.code(405).header("allow", "POST, OPTIONS").send());

    app.post("/mcp", async (request, reply) => {
        const raw = typeof request.body === "string" ? request.body : "";
        let body: unknown;
        try {
            body = JSON.parse(raw);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            return reply.code(400).send(jsonRpcError(null, RPC_ERROR.PARSE_ERROR, `Parse error: ${message}`));
        }

        const { id: sessionId, session } = dispatcher.openSession(
            headerValue(request.headers["mcp-session-id"]),
            headerValue(request.headers["mcp-protocol-version"]),
        );
        const response = await dispatcher.handleMessage(body, session);
        // initialize 가 버전을 바꿀 수 있으므로 처리 후에 보낸다.
        reply.header("mcp-session-id", sessionId);
        reply.header("mcp-protocol-version", session.protocolVersion || LATEST_PROTOCOL_VERSION);
        if (response === null) {
            return reply.code(202).send();
        }

        // SSE 스트림 응답 (이벤트 하나로 끝난다)
        if (headerValue(request.headers.accept)?.includes("text/event-stream")) {
            return reply
                .header("content-type", "text/event-stream")
                .header("cache-control", "no-cache")
                .send(`event: message\ndata: ${JSON.stringify(response)}\n\n`);
        }

        return reply.send(response);
    });

    return app;
}
